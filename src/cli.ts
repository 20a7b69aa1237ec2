#!/usr/bin/env node
import { Command } from "commander";
import dotenv from "dotenv";
import { Effect, Layer } from "effect";
import { buildCommand } from "./commands/build.js";
import type { BuildFlags } from "./commands/build.js";
import { runCommand, sessionStoreLayer } from "./commands/common.js";
import { ACTION_KINDS } from "./commands/requests.js";
import {
  exportCommand,
  importCommand,
  listCommand,
  statusCommand,
} from "./commands/sessions.js";
import { signCommand } from "./commands/sign.js";
import type { SignFlags } from "./commands/sign.js";
import { stateCommand } from "./commands/state.js";
import { submitCommand } from "./commands/submit.js";
import { OracleConfig, withConfiguredLogLevel } from "./config.js";
import { Chain } from "./services/chain.js";
import { Signer } from "./services/signer.js";
import { Gate } from "./services/submitter.js";

dotenv.config();

const program = new Command();

program
  .name("oracle-coordinator")
  .description("Build, cosign and submit price oracle transactions")
  .version("0.1.0");

program
  .command("state")
  .description("Resolve and print the current oracle state")
  .action(async () => {
    await runCommand(
      stateCommand.pipe(
        withConfiguredLogLevel,
        Effect.provide(Layer.mergeAll(OracleConfig.layer, Chain.Default)),
      ),
    );
  });

program
  .command("build")
  .description("Build a transaction and open its signing session")
  .argument("<action>", `one of ${ACTION_KINDS.join(", ")}`)
  .option("--price <integer>", "NodeUpdate: price to publish")
  .option("--amount <integer>", "AddFunds: reward tokens to deposit")
  .option("--node <pkh...>", "AddNodes, RemoveNodes: node key hashes")
  .option("--payout-rewards", "RemoveNodes: pay out held rewards", false)
  .option("--settings <file>", "EditSettings: JSON settings file")
  .option("--recipient <address>", "PlatformCollect, NodeCollect, Close")
  .option("--disbursement <mode>", "Close: ToNodes or ToOneAddress")
  .option("--out <file>", "write the signature envelope to a file")
  .action(
    async (
      action: string,
      options: Omit<BuildFlags, "nodes"> & { readonly node?: string[] },
    ) => {
      await runCommand(
        buildCommand(action, { ...options, nodes: options.node }).pipe(
          withConfiguredLogLevel,
          Effect.provide(
            Layer.mergeAll(OracleConfig.layer, Chain.Default, sessionStoreLayer),
          ),
        ),
      );
    },
  );

program
  .command("sign")
  .description("Check and cosign a pending signing session")
  .argument("<session>", "transaction hash of the session")
  .option("--allow-own-inputs", "allow the transaction to spend this wallet", false)
  .option("--skip-checks", "sign without pre-signing checks", false)
  .option("--out <file>", "write the updated envelope to a file")
  .action(async (id: string, options: SignFlags) => {
    await runCommand(
      signCommand(id, options).pipe(
        withConfiguredLogLevel,
        Effect.provide(
          Layer.mergeAll(
            OracleConfig.layer,
            Chain.Default,
            Signer.Default,
            sessionStoreLayer,
          ),
        ),
      ),
    );
  });

program
  .command("import")
  .description("Merge a signature envelope into the local sessions")
  .argument("<file>", "envelope file")
  .action(async (path: string) => {
    await runCommand(
      importCommand(path).pipe(
        withConfiguredLogLevel,
        Effect.provide(Layer.merge(OracleConfig.layer, sessionStoreLayer)),
      ),
    );
  });

program
  .command("export")
  .description("Write the envelope of a session to a file")
  .argument("<session>", "transaction hash of the session")
  .argument("<file>", "envelope file")
  .action(async (id: string, path: string) => {
    await runCommand(
      exportCommand(id, path).pipe(
        withConfiguredLogLevel,
        Effect.provide(Layer.merge(OracleConfig.layer, sessionStoreLayer)),
      ),
    );
  });

program
  .command("status")
  .description("Show the signatures a session still needs")
  .argument("[session]", "transaction hash of the session; all when omitted")
  .action(async (id: string | undefined) => {
    const layer = Layer.merge(OracleConfig.layer, sessionStoreLayer);
    if (id === undefined) {
      await runCommand(
        listCommand.pipe(withConfiguredLogLevel, Effect.provide(layer)),
      );
      return;
    }
    await runCommand(
      statusCommand(id).pipe(withConfiguredLogLevel, Effect.provide(layer)),
    );
  });

program
  .command("submit")
  .description("Submit a completely signed session")
  .argument("<session>", "transaction hash of the session")
  .option("--wait", "wait for the transaction to be confirmed", false)
  .action(async (id: string, options: { readonly wait?: boolean }) => {
    await runCommand(
      submitCommand(id, options).pipe(
        withConfiguredLogLevel,
        Effect.provide(
          Layer.mergeAll(
            OracleConfig.layer,
            Chain.Default,
            Gate.Default,
            sessionStoreLayer,
          ),
        ),
      ),
    );
  });

await program.parseAsync();

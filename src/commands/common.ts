import * as FS from "node:fs";
import { getAddressDetails } from "@lucid-evolution/lucid";
import type { Address } from "@lucid-evolution/lucid";
import * as chalk_ from "chalk";
import { Cause, Effect, Exit, Layer, Option } from "effect";
import { OracleConfig } from "../config.js";
import type { OracleConfigDep } from "../config.js";
import { ConfigError, SessionStoreError } from "../errors.js";
import { SessionStoreService } from "../session-store.js";
import { makeSignatureCoordinator } from "../signature-coordinator.js";
import type { SessionStatus } from "../signature-coordinator.js";
import type { Caller } from "../tx-builder/index.js";

export const chalk = new chalk_.Chalk();

export const signerAddress = (
  config: OracleConfigDep,
): Effect.Effect<Address, ConfigError> =>
  Option.match(config.SIGNER_ADDRESS, {
    onNone: () =>
      Effect.fail(
        new ConfigError({
          message: "SIGNER_ADDRESS is required",
          cause: "Missing environment variable",
          fieldsAndValues: [["SIGNER_ADDRESS", ""]],
        }),
      ),
    onSome: (address) => Effect.succeed(address),
  });

/**
 * The configured wallet as a transaction builder. Its address must carry a
 * key payment credential.
 */
export const callerFromConfig = (
  config: OracleConfigDep,
): Effect.Effect<Caller, ConfigError> =>
  Effect.gen(function* () {
    const address = yield* signerAddress(config);
    const invalid = (cause: unknown) =>
      new ConfigError({
        message: "SIGNER_ADDRESS is not a key address",
        cause,
        fieldsAndValues: [["SIGNER_ADDRESS", address]],
      });
    const details = yield* Effect.try({
      try: () => getAddressDetails(address),
      catch: invalid,
    });
    const credential = details.paymentCredential;
    if (credential === undefined || credential.type !== "Key") {
      return yield* Effect.fail(invalid("No key payment credential"));
    }
    return { pubKeyHash: credential.hash, address };
  });

export const coordinator = Effect.map(SessionStoreService, makeSignatureCoordinator);

export const sessionStoreLayer = Layer.unwrapEffect(
  Effect.map(OracleConfig, (config) => SessionStoreService.file(config.SESSION_DIR)),
).pipe(Layer.provide(OracleConfig.layer));

export const readBytes = (path: string) =>
  Effect.try({
    try: () => new Uint8Array(FS.readFileSync(path)),
    catch: (e) =>
      new SessionStoreError({ message: `Failed to read ${path}`, cause: e }),
  });

export const writeBytes = (path: string, bytes: Uint8Array) =>
  Effect.try({
    try: () => FS.writeFileSync(path, bytes),
    catch: (e) =>
      new SessionStoreError({ message: `Failed to write ${path}`, cause: e }),
  });

export const describeStatus = (id: string, status: SessionStatus): string => {
  switch (status._tag) {
    case "Pending":
      return `${chalk.yellow("pending")} ${id}\n  missing: ${status.missing.join(", ")}`;
    case "Complete":
      return `${chalk.green("complete")} ${id}`;
  }
};

/**
 * Runs a fully provided command program, printing failures and exiting with
 * status 1.
 */
export const runCommand = async <A, E>(
  program: Effect.Effect<A, E>,
): Promise<void> => {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isFailure(exit)) {
    console.error(chalk.red(Cause.pretty(exit.cause)));
    process.exit(1);
  }
};

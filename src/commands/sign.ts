import { Effect, Option } from "effect";
import { OracleConfig } from "../config.js";
import { Chain } from "../services/chain.js";
import { Signer } from "../services/signer.js";
import { validateForCosigning } from "../tx-validation.js";
import { coordinator, describeStatus, writeBytes } from "./common.js";

export type SignFlags = {
  readonly allowOwnInputs?: boolean;
  readonly skipChecks?: boolean;
  readonly out?: string;
};

/**
 * Cosigns a pending session with the configured key after checking the
 * transaction against the current chain state.
 */
export const signCommand = (id: string, flags: SignFlags) =>
  Effect.gen(function* () {
    const config = yield* OracleConfig;
    const { query } = yield* Chain;
    const signer = yield* Signer;
    const sessions = yield* coordinator;
    const session = yield* sessions.session(id);

    if (flags.skipChecks === true) {
      yield* Effect.logWarning(`Signing ${id} without pre-signing checks`);
    } else {
      yield* validateForCosigning(query, session.body, {
        signer: signer.pubKeyHash,
        ownAddresses: Option.toArray(config.SIGNER_ADDRESS),
        allowOwnInputs: flags.allowOwnInputs ?? false,
        expectedTxHash: id,
      });
    }

    const status = yield* sessions.contribute(
      id,
      signer.pubKeyHash,
      signer.sign(id),
    );
    if (flags.out !== undefined) {
      yield* writeBytes(flags.out, yield* sessions.exportEnvelope(id));
      yield* Effect.logInfo(`Envelope written to ${flags.out}`);
    }
    console.log(describeStatus(id, status));
    return status;
  });

import { Effect, Option, Redacted } from "effect";
import { OracleConfig } from "../config.js";
import { keyHashOf, parseSigningKey } from "../services/signer.js";
import { Chain } from "../services/chain.js";
import { makeWitness } from "../transaction.js";
import { resolveAndBuildProgram } from "../tx-builder/index.js";
import { callerFromConfig, coordinator, describeStatus, writeBytes } from "./common.js";
import { requestFromFlags } from "./requests.js";
import type { RequestFlags } from "./requests.js";

export type BuildFlags = RequestFlags & {
  readonly out?: string;
};

/**
 * Builds the transaction for `action`, opens its signing session and, when a
 * signing key is configured and required, adds the builder's own signature.
 */
export const buildCommand = (action: string, flags: BuildFlags) =>
  Effect.gen(function* () {
    const config = yield* OracleConfig;
    const { query } = yield* Chain;
    const request = yield* requestFromFlags(action, flags);
    const caller = yield* callerFromConfig(config);
    const result = yield* resolveAndBuildProgram(query, request, caller, {
      txValidityMs: config.TX_VALIDITY_MS,
    });
    const sessions = yield* coordinator;
    const id = yield* sessions.start(result.tx, result.requiredSigners, request);

    let status = yield* sessions.status(id);
    if (Option.isSome(config.SIGNING_KEY)) {
      const key = yield* parseSigningKey(Redacted.value(config.SIGNING_KEY.value));
      const pkh = keyHashOf(key);
      if (result.requiredSigners.includes(pkh)) {
        status = yield* sessions.contribute(id, pkh, makeWitness(id, key));
      }
    }

    if (flags.out !== undefined) {
      yield* writeBytes(flags.out, yield* sessions.exportEnvelope(id));
      yield* Effect.logInfo(`Envelope written to ${flags.out}`);
    }
    console.log(`${request.kind} transaction built`);
    console.log(describeStatus(id, status));
    return id;
  });

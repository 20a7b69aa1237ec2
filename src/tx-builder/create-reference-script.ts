import { Effect } from "effect";
import { REFERENCE_SCRIPT_LOVELACE } from "../constants.js";
import { isOracleScript, oracleScriptHash } from "../deployment.js";
import { StateNotFound } from "../errors.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

/**
 * Publishes the oracle validator in a UTxO at the oracle address so later
 * transactions can reference it instead of carrying it.
 */
export const createReferenceScriptSkeleton = (
  ctx: SkeletonContext,
): Effect.Effect<TxSkeleton, StateNotFound> =>
  Effect.gen(function* () {
    const script = ctx.deployment.oracleScript;
    if (script === null) {
      return yield* Effect.fail(
        new StateNotFound({
          message: "Failed to create the reference script UTxO",
          cause: "No oracle script is configured",
        }),
      );
    }
    const expectedHash = yield* oracleScriptHash(ctx.deployment);
    if (!isOracleScript(script, expectedHash)) {
      return yield* Effect.fail(
        new StateNotFound({
          message: "Failed to create the reference script UTxO",
          cause: "The configured script does not guard the oracle address",
        }),
      );
    }
    return {
      scriptInputs: [],
      referenceInputs: [],
      outputs: [
        {
          address: ctx.deployment.oracleAddress,
          assets: { lovelace: REFERENCE_SCRIPT_LOVELACE },
          datum: null,
          scriptRef: script,
        },
      ],
      mint: {},
    };
  });

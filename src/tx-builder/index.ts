import { Effect } from "effect";
import type { ActionRequest } from "../action-request.js";
import type { ChainQuery, ResolveStateError } from "../chain-query.js";
import { makeReturn } from "../common.js";
import { DEFAULT_TX_VALIDITY_MS } from "../constants.js";
import { stateUnits } from "../deployment.js";
import { IllegalTransition, StateNotFound } from "../errors.js";
import { encodeOracleModel } from "../oracle-state.js";
import type { OracleState } from "../oracle-state.js";
import { checkTransition } from "../state-machine.js";
import { addFundsSkeleton } from "./add-funds.js";
import { addNodesSkeleton } from "./add-nodes.js";
import { aggregateSkeleton } from "./aggregate.js";
import { closeSkeleton } from "./close.js";
import { nodeCollectSkeleton, platformCollectSkeleton } from "./collect.js";
import { assembleProgram } from "./core.js";
import type { AssembleError } from "./core.js";
import { createReferenceScriptSkeleton } from "./create-reference-script.js";
import { editSettingsSkeleton } from "./edit-settings.js";
import { nodeUpdateSkeleton } from "./node-update.js";
import { removeNodesSkeleton } from "./remove-nodes.js";
import type {
  BuildOptions,
  BuildResult,
  Caller,
  SkeletonContext,
  TxSkeleton,
} from "./types.js";

export type BuildError = IllegalTransition | AssembleError;

export const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  txValidityMs: DEFAULT_TX_VALIDITY_MS,
};

const skeletonFor = (
  ctx: SkeletonContext,
): Effect.Effect<TxSkeleton, StateNotFound> => {
  switch (ctx.plan.request.kind) {
    case "NodeUpdate":
      return Effect.succeed(nodeUpdateSkeleton(ctx));
    case "Aggregate":
      return Effect.succeed(aggregateSkeleton(ctx));
    case "AddNodes":
      return Effect.succeed(addNodesSkeleton(ctx));
    case "RemoveNodes":
      return Effect.succeed(removeNodesSkeleton(ctx));
    case "AddFunds":
      return Effect.succeed(addFundsSkeleton(ctx));
    case "EditSettings":
      return Effect.succeed(editSettingsSkeleton(ctx));
    case "NodeCollect":
      return Effect.succeed(nodeCollectSkeleton(ctx));
    case "PlatformCollect":
      return Effect.succeed(platformCollectSkeleton(ctx));
    case "Close":
      return Effect.succeed(closeSkeleton(ctx));
    case "CreateReferenceScript":
      return createReferenceScriptSkeleton(ctx);
  }
};

/**
 * Builds the unsigned transaction realizing `request` against `state`.
 *
 * The transition is checked first, so an illegal request fails before any
 * chain query. Only reads are performed: wallet UTxOs and ledger parameters.
 */
export const buildProgram = (
  query: ChainQuery,
  state: OracleState,
  request: ActionRequest,
  caller: Caller,
  options: BuildOptions = DEFAULT_BUILD_OPTIONS,
): Effect.Effect<BuildResult, BuildError> =>
  Effect.gen(function* () {
    const snapshot = state.snapshot;
    if (snapshot === null) {
      return yield* Effect.fail(
        new StateNotFound({
          message: `Failed to build the ${request.kind} transaction`,
          cause: "The state was not resolved from chain",
        }),
      );
    }
    const plan = yield* checkTransition(state, request, {
      caller: caller.pubKeyHash,
      now: snapshot.observedAt,
    });
    const ctx: SkeletonContext = {
      deployment: query.deployment,
      units: stateUnits(query.deployment),
      state,
      snapshot,
      plan,
      caller,
      next: encodeOracleModel(plan.next.model),
    };
    const skeleton = yield* skeletonFor(ctx);
    const result = yield* assembleProgram(query, ctx, skeleton, options);
    yield* Effect.logInfo(
      `Built ${request.kind} transaction ${result.txHash} (fee ${result.tx.body.fee} lovelace, ${result.requiredSigners.length} required signer(s))`,
    );
    return result;
  });

export const build = (
  query: ChainQuery,
  state: OracleState,
  request: ActionRequest,
  caller: Caller,
  options?: BuildOptions,
) => makeReturn(buildProgram(query, state, request, caller, options)).unsafeRun();

/**
 * Resolves a fresh state and builds against it.
 */
export const resolveAndBuildProgram = (
  query: ChainQuery,
  request: ActionRequest,
  caller: Caller,
  options: BuildOptions = DEFAULT_BUILD_OPTIONS,
): Effect.Effect<BuildResult, BuildError | ResolveStateError> =>
  Effect.gen(function* () {
    const state = yield* query.resolveState();
    return yield* buildProgram(query, state, request, caller, options);
  });

export const resolveAndBuild = (
  query: ChainQuery,
  request: ActionRequest,
  caller: Caller,
  options?: BuildOptions,
) =>
  makeReturn(resolveAndBuildProgram(query, request, caller, options)).unsafeRun();

export { pickCollateral } from "./core.js";
export type { AssembleError } from "./core.js";
export * from "./types.js";

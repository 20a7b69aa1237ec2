import {
  nextAggStateOutput,
  nextRewardOutput,
  nodeUTxOs,
  payoutOutputs,
  spendWith,
} from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

/**
 * Spends and burns the removed nodes' UTxOs. Their lovelace returns to the
 * caller as change; unclaimed rewards are paid out of the reward UTxO.
 */
export const removeNodesSkeleton = (ctx: SkeletonContext): TxSkeleton => {
  const request = ctx.plan.request;
  const removed = request.kind === "RemoveNodes" ? request.nodes : [];
  return {
    scriptInputs: spendWith("RemoveNodes", [
      ctx.snapshot.aggState,
      ctx.snapshot.reward,
      ...nodeUTxOs(ctx, removed),
    ]),
    referenceInputs: [],
    outputs: [
      nextAggStateOutput(ctx),
      nextRewardOutput(ctx),
      ...payoutOutputs(ctx),
    ],
    mint: { [ctx.units.nodeFeed]: -BigInt(removed.length) },
  };
};

import { nextRewardOutput, payoutOutputs, spendWith } from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

/**
 * Node and platform collections both spend the reward UTxO and read the
 * aggregation state for the node list and platform keys.
 */
const collectSkeleton =
  (redeemer: "NodeCollect" | "PlatformCollect") =>
  (ctx: SkeletonContext): TxSkeleton => ({
    scriptInputs: spendWith(redeemer, [ctx.snapshot.reward]),
    referenceInputs: [ctx.snapshot.aggState],
    outputs: [nextRewardOutput(ctx), ...payoutOutputs(ctx)],
    mint: {},
  });

export const nodeCollectSkeleton = collectSkeleton("NodeCollect");

export const platformCollectSkeleton = collectSkeleton("PlatformCollect");

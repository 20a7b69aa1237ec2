import {
  nextAggStateOutput,
  nextOracleFeedOutput,
  nextRewardOutput,
  spendWith,
} from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

/**
 * Node UTxOs are read, not spent: their feeds are the aggregation input and
 * stay in place for the next round. The exchange rate UTxO, when fees are
 * converted, is read the same way. The charge moves from the reserve held by
 * the aggregation-state UTxO to the reward UTxO.
 */
export const aggregateSkeleton = (ctx: SkeletonContext): TxSkeleton => ({
  scriptInputs: spendWith("Aggregate", [
    ctx.snapshot.aggState,
    ctx.snapshot.oracleFeed,
    ctx.snapshot.reward,
  ]),
  referenceInputs:
    ctx.snapshot.rateFeed === null
      ? Object.values(ctx.snapshot.nodes)
      : [...Object.values(ctx.snapshot.nodes), ctx.snapshot.rateFeed],
  outputs: [
    nextAggStateOutput(ctx),
    nextOracleFeedOutput(ctx),
    nextRewardOutput(ctx),
  ],
  mint: {},
});

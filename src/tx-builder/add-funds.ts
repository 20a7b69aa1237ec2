import { nextAggStateOutput, spendWith } from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

// The added reward tokens are selected from the caller's wallet.
export const addFundsSkeleton = (ctx: SkeletonContext): TxSkeleton => ({
  scriptInputs: spendWith("AddFunds", [ctx.snapshot.aggState]),
  referenceInputs: [],
  outputs: [nextAggStateOutput(ctx)],
  mint: {},
});

import { nextAggStateOutput, spendWith } from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

export const editSettingsSkeleton = (ctx: SkeletonContext): TxSkeleton => ({
  scriptInputs: spendWith("UpdateSettings", [ctx.snapshot.aggState]),
  referenceInputs: [],
  outputs: [nextAggStateOutput(ctx)],
  mint: {},
});

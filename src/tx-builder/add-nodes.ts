import { NODE_OUTPUT_LOVELACE } from "../constants.js";
import { encodeNodeDatum } from "../datums.js";
import {
  nextAggStateOutput,
  nextRewardOutput,
  oracleOutput,
  spendWith,
} from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

export const addNodesSkeleton = (ctx: SkeletonContext): TxSkeleton => {
  const request = ctx.plan.request;
  const added = request.kind === "AddNodes" ? request.nodes : [];
  return {
    scriptInputs: spendWith("AddNodes", [
      ctx.snapshot.aggState,
      ctx.snapshot.reward,
    ]),
    referenceInputs: [],
    outputs: [
      nextAggStateOutput(ctx),
      nextRewardOutput(ctx),
      ...added.map((operator) =>
        oracleOutput(
          ctx,
          { lovelace: NODE_OUTPUT_LOVELACE, [ctx.units.nodeFeed]: 1n },
          encodeNodeDatum({ operator, feed: null }),
        ),
      ),
    ],
    mint: { [ctx.units.nodeFeed]: BigInt(added.length) },
  };
};

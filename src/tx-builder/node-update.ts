import {
  nextNodeOutput,
  spendWith,
} from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

/**
 * The caller republishes its own node UTxO with a new feed.
 */
export const nodeUpdateSkeleton = (ctx: SkeletonContext): TxSkeleton => {
  const operator = ctx.caller.pubKeyHash;
  const nodeUTxO = ctx.snapshot.nodes[operator];
  return {
    scriptInputs: spendWith("NodeUpdate", [nodeUTxO]),
    referenceInputs: [],
    outputs: [nextNodeOutput(ctx, operator, nodeUTxO)],
    mint: {},
  };
};

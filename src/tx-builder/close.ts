import type { TxOutput } from "../transaction.js";
import { quantityOf } from "../common.js";
import { NODE_OUTPUT_LOVELACE } from "../constants.js";
import { payoutOutputs, spendWith } from "./common.js";
import type { SkeletonContext, TxSkeleton } from "./types.js";

/**
 * Spends every state UTxO and burns every marker. Node rewards go to their
 * operators when disbursed `ToNodes`; whatever reward tokens remain go to the
 * recipient, and the released lovelace returns to the caller as change.
 */
export const closeSkeleton = (ctx: SkeletonContext): TxSkeleton => {
  const request = ctx.plan.request;
  const { snapshot, units, deployment } = ctx;
  const nodes = Object.values(snapshot.nodes);
  const payouts = payoutOutputs(ctx);
  const paid = ctx.plan.payouts.reduce((acc, p) => acc + p.amount, 0n);
  const held = [snapshot.aggState, snapshot.oracleFeed, snapshot.reward].reduce(
    (acc, u) => acc + quantityOf(u.assets, deployment.rewardUnit),
    0n,
  );
  const remaining = held - paid;
  const sweep: TxOutput[] =
    request.kind === "Close" && remaining > 0n
      ? [
          {
            address: request.recipient,
            assets: {
              lovelace: NODE_OUTPUT_LOVELACE,
              [deployment.rewardUnit]: remaining,
            },
            datum: null,
            scriptRef: null,
          },
        ]
      : [];
  return {
    scriptInputs: spendWith("OracleClose", [
      snapshot.aggState,
      snapshot.oracleFeed,
      snapshot.reward,
      ...nodes,
    ]),
    referenceInputs: [],
    outputs: [...payouts, ...sweep],
    mint: {
      [units.aggState]: -1n,
      [units.oracleFeed]: -1n,
      [units.reward]: -1n,
      [units.nodeFeed]: -BigInt(nodes.length),
    },
  };
};

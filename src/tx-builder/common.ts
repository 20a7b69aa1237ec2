import type { Assets, Datum, UTxO, Unit } from "@lucid-evolution/lucid";
import { addAssets } from "../common.js";
import type { PubKeyHash } from "../common.js";
import { NODE_OUTPUT_LOVELACE } from "../constants.js";
import { keyHashAddress } from "../deployment.js";
import type { OracleModel } from "../oracle-state.js";
import { encodeOracleRedeemer } from "../redeemers.js";
import type { OracleRedeemer } from "../redeemers.js";
import type { Payout } from "../state-machine.js";
import type { TxOutput } from "../transaction.js";
import type { ScriptInput, SkeletonContext } from "./types.js";

export const withQuantity = (assets: Assets, unit: Unit, qty: bigint): Assets =>
  addAssets({ ...assets, [unit]: 0n }, { [unit]: qty });

/**
 * Reward tokens the reward UTxO must hold to back every recorded reward.
 */
export const rewardTotal = (model: OracleModel): bigint =>
  model.nodes.reduce((acc, n) => acc + n.reward, model.platformReward);

export const spendWith = (
  redeemer: OracleRedeemer,
  utxos: readonly UTxO[],
): ScriptInput[] => {
  const data = encodeOracleRedeemer(redeemer);
  return utxos.map((utxo) => ({ utxo, redeemer: data }));
};

export const oracleOutput = (
  ctx: SkeletonContext,
  assets: Assets,
  datum: Datum,
): TxOutput => ({
  address: ctx.deployment.oracleAddress,
  assets,
  datum,
  scriptRef: null,
});

export const nextAggStateOutput = (ctx: SkeletonContext): TxOutput =>
  oracleOutput(
    ctx,
    withQuantity(
      ctx.snapshot.aggState.assets,
      ctx.deployment.rewardUnit,
      ctx.plan.next.reserve,
    ),
    ctx.next.aggState,
  );

export const nextOracleFeedOutput = (ctx: SkeletonContext): TxOutput =>
  oracleOutput(ctx, ctx.snapshot.oracleFeed.assets, ctx.next.oracleFeed);

export const nextRewardOutput = (ctx: SkeletonContext): TxOutput =>
  oracleOutput(
    ctx,
    withQuantity(
      ctx.snapshot.reward.assets,
      ctx.deployment.rewardUnit,
      rewardTotal(ctx.plan.next.model),
    ),
    ctx.next.reward,
  );

/**
 * Node UTxO carried over with the datum of the post-transition state.
 */
export const nextNodeOutput = (
  ctx: SkeletonContext,
  operator: PubKeyHash,
  utxo: UTxO,
): TxOutput => {
  const index = ctx.plan.next.model.nodes.findIndex((n) => n.operator === operator);
  return oracleOutput(ctx, utxo.assets, ctx.next.nodes[index]);
};

export const payoutOutput = (ctx: SkeletonContext, payout: Payout): TxOutput => ({
  address:
    "operator" in payout.recipient
      ? keyHashAddress(ctx.deployment.network, payout.recipient.operator)
      : payout.recipient.address,
  assets: addAssets(
    { lovelace: NODE_OUTPUT_LOVELACE },
    { [ctx.deployment.rewardUnit]: payout.amount },
  ),
  datum: null,
  scriptRef: null,
});

export const payoutOutputs = (ctx: SkeletonContext): TxOutput[] =>
  ctx.plan.payouts.map((p) => payoutOutput(ctx, p));

export const nodeUTxOs = (
  ctx: SkeletonContext,
  operators: readonly PubKeyHash[],
): UTxO[] => operators.map((operator) => ctx.snapshot.nodes[operator]);

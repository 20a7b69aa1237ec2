import type { Datum, UTxO } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import type { PubKeyHash } from "./common.js";
import { FACTOR_RESOLUTION } from "./constants.js";
import {
  encodeAggStateDatum,
  encodeNodeDatum,
  encodeOracleFeedDatum,
  encodeRewardDatum,
} from "./datums.js";
import type {
  DataFeed,
  NodeState,
  OracleReward,
  OracleSettings,
  PriceData,
} from "./datums.js";
import { StateNotFound } from "./errors.js";

export type Lifecycle = "Active" | "Closed";

export type NodeEntry = {
  readonly operator: PubKeyHash;
  readonly feed: DataFeed | null;
  readonly reward: bigint;
};

/**
 * Everything the datums say about the oracle, in node-list order.
 */
export type OracleModel = {
  readonly price: PriceData | null;
  readonly settings: OracleSettings;
  readonly nodes: readonly NodeEntry[];
  readonly platformReward: bigint;
};

/**
 * The UTxOs a state was resolved from. Every transition spends some of them,
 * so a snapshot is only good until the next confirmed oracle transaction.
 */
export type OracleSnapshot = {
  readonly aggState: UTxO;
  readonly oracleFeed: UTxO;
  readonly reward: UTxO;
  readonly nodes: Readonly<Record<PubKeyHash, UTxO>>;
  readonly referenceScript: UTxO | null;
  readonly rateFeed: UTxO | null;
  readonly observedAt: number;
};

export type OracleState = {
  readonly lifecycle: Lifecycle;
  readonly model: OracleModel;
  /** Reward-token balance held by the aggregation-state UTxO. */
  readonly reserve: bigint;
  /**
   * Reward tokens per `COIN_PRECISION` fee units, read from the deployment's
   * rate feed. `null` charges fees as the settings state them.
   */
  readonly feeRate: bigint | null;
  /** `null` for states projected by the builder rather than read from chain. */
  readonly snapshot: OracleSnapshot | null;
};

export type EncodedOracleModel = {
  readonly aggState: Datum;
  readonly oracleFeed: Datum;
  readonly reward: Datum;
  readonly nodes: readonly Datum[];
};

/**
 * Minimum number of fresh node feeds an aggregation needs.
 */
export const requiredNodeCount = (settings: OracleSettings): bigint =>
  (settings.updatedNodes * BigInt(settings.nodeList.length)) / FACTOR_RESOLUTION;

export const isOwner = (settings: OracleSettings, pkh: PubKeyHash): boolean =>
  settings.platform.multisigPkhs.includes(pkh);

export const findNode = (
  model: OracleModel,
  operator: PubKeyHash,
): NodeEntry | undefined => model.nodes.find((n) => n.operator === operator);

export const toNodeState = (entry: NodeEntry): NodeState => ({
  operator: entry.operator,
  feed: entry.feed,
});

export const toOracleReward = (model: OracleModel): OracleReward => ({
  nodeRewards: model.nodes.map((n) => ({
    operator: n.operator,
    amount: n.reward,
  })),
  platformReward: model.platformReward,
});

export const encodeOracleModel = (model: OracleModel): EncodedOracleModel => ({
  aggState: encodeAggStateDatum(model.settings),
  oracleFeed: encodeOracleFeedDatum(model.price),
  reward: encodeRewardDatum(toOracleReward(model)),
  nodes: model.nodes.map((n) => encodeNodeDatum(toNodeState(n))),
});

/**
 * Joins the per-UTxO datums into one model. Node datums and reward entries
 * must cover exactly the operators in the settings' node list.
 */
export const assembleOracleModel = (parts: {
  settings: OracleSettings;
  price: PriceData | null;
  reward: OracleReward;
  nodes: readonly NodeState[];
}): Effect.Effect<OracleModel, StateNotFound> =>
  Effect.gen(function* () {
    const { settings, price, reward, nodes } = parts;
    const listed = new Set(settings.nodeList);
    const strayReward = reward.nodeRewards.find((r) => !listed.has(r.operator));
    if (strayReward !== undefined) {
      return yield* Effect.fail(
        new StateNotFound({
          message: "Reward ledger does not match the node list",
          cause: `Reward entry for unlisted node ${strayReward.operator}`,
        }),
      );
    }
    const entries: NodeEntry[] = [];
    for (const operator of settings.nodeList) {
      const node = nodes.find((n) => n.operator === operator);
      if (node === undefined) {
        return yield* Effect.fail(
          new StateNotFound({
            message: `Failed to find the UTxO of node ${operator}`,
            cause: "Listed node has no node datum",
          }),
        );
      }
      const rewardInfo = reward.nodeRewards.find((r) => r.operator === operator);
      if (rewardInfo === undefined) {
        return yield* Effect.fail(
          new StateNotFound({
            message: `Failed to find the reward entry of node ${operator}`,
            cause: "Listed node has no reward entry",
          }),
        );
      }
      entries.push({ operator, feed: node.feed, reward: rewardInfo.amount });
    }
    return {
      price,
      settings,
      nodes: entries,
      platformReward: reward.platformReward,
    };
  });

import type { Address } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import { validateActionRequest } from "./action-request.js";
import type { ActionRequest } from "./action-request.js";
import { isPubKeyHash } from "./common.js";
import type { PubKeyHash } from "./common.js";
import { aggregate } from "./consensus.js";
import { COIN_PRECISION, FACTOR_RESOLUTION } from "./constants.js";
import { encodeAggStateDatum } from "./datums.js";
import type { OracleSettings } from "./datums.js";
import { IllegalTransition } from "./errors.js";
import { findNode, isOwner } from "./oracle-state.js";
import type { NodeEntry, OracleModel, OracleState } from "./oracle-state.js";

export type TransitionContext = {
  /** Payment key hash of the party building the transaction. */
  readonly caller: PubKeyHash;
  /** POSIX time in milliseconds the transition is evaluated at. */
  readonly now: number;
};

export type PayoutRecipient =
  | { readonly operator: PubKeyHash }
  | { readonly address: Address };

/** A reward-token payment leaving the oracle. */
export type Payout = {
  readonly recipient: PayoutRecipient;
  readonly amount: bigint;
};

export type AggregationOutcome = {
  readonly median: bigint;
  readonly fresh: readonly PubKeyHash[];
  readonly rewarded: readonly PubKeyHash[];
  readonly charged: bigint;
};

export type TransitionPlan = {
  readonly request: ActionRequest;
  readonly next: OracleState;
  readonly requiredSigners: readonly PubKeyHash[];
  readonly payouts: readonly Payout[];
  readonly aggregation: AggregationOutcome | null;
};

/**
 * Validity rules a settings value must satisfy before it can be written to
 * the aggregation-state datum. Returns the list of violated rules.
 */
export const settingsProblems = (settings: OracleSettings): string[] => {
  const problems: string[] = [];
  const inPercentRange = (x: bigint) => x >= 0n && x <= FACTOR_RESOLUTION;
  if (new Set(settings.nodeList).size !== settings.nodeList.length) {
    problems.push("node list has duplicates");
  }
  if (!settings.nodeList.every(isPubKeyHash)) {
    problems.push("node list has malformed key hashes");
  }
  if (!inPercentRange(settings.updatedNodes)) {
    problems.push("updated nodes percentage out of range");
  }
  if (!inPercentRange(settings.aggregateChange)) {
    problems.push("aggregate change percentage out of range");
  }
  if (settings.updatedNodeTime <= 0n) {
    problems.push("updated node time must be positive");
  }
  if (settings.aggregateTime <= 0n) {
    problems.push("aggregate time must be positive");
  }
  const fees = settings.nodeFeePrice;
  if (fees.nodeFee < 0n || fees.aggregateFee < 0n || fees.platformFee < 0n) {
    problems.push("fees must not be negative");
  }
  if (settings.iqrMultiplier <= 0n) {
    problems.push("IQR multiplier must be positive");
  }
  if (settings.divergence <= 0n) {
    problems.push("divergence must be positive");
  }
  const { multisigPkhs, multisigThreshold } = settings.platform;
  if (
    multisigPkhs.length === 0 ||
    !multisigPkhs.every(isPubKeyHash) ||
    new Set(multisigPkhs).size !== multisigPkhs.length
  ) {
    problems.push("platform keys must be distinct key hashes");
  }
  if (
    multisigThreshold <= 0n ||
    multisigThreshold > BigInt(multisigPkhs.length)
  ) {
    problems.push("platform threshold must be between 1 and the key count");
  }
  return problems;
};

/**
 * A node feed is fresh when it was published after the last aggregation and
 * `now` still falls inside its staleness window.
 */
export const isFreshFeed = (
  node: NodeEntry,
  model: OracleModel,
  now: bigint,
): boolean => {
  if (node.feed === null) return false;
  const publishedAt = node.feed.lastUpdate;
  if (model.price !== null && publishedAt <= model.price.timestamp) {
    return false;
  }
  return (
    publishedAt <= now && now <= publishedAt + model.settings.updatedNodeTime
  );
};

export type AggregationFees = OracleSettings["nodeFeePrice"];

/**
 * Fees an aggregation charges, in reward tokens. With a rate each fee is
 * converted on its own and rounded down.
 */
export const aggregationFees = (
  fees: AggregationFees,
  rate: bigint | null,
): AggregationFees => {
  if (rate === null) {
    return fees;
  }
  const scale = (fee: bigint) => (fee * rate) / COIN_PRECISION;
  return {
    nodeFee: scale(fees.nodeFee),
    aggregateFee: scale(fees.aggregateFee),
    platformFee: scale(fees.platformFee),
  };
};

const illegal = (request: ActionRequest, reason: string) =>
  Effect.fail(
    new IllegalTransition({
      message: `${request.kind} is not allowed: ${reason}`,
      cause: reason,
      action: request.kind,
    }),
  );

const withModel = (
  state: OracleState,
  model: OracleModel,
  reserve: bigint = state.reserve,
): OracleState => ({
  lifecycle: state.lifecycle,
  model,
  reserve,
  feeRate: state.feeRate,
  snapshot: null,
});

const mapNodes = (
  model: OracleModel,
  f: (node: NodeEntry) => NodeEntry,
): OracleModel => ({ ...model, nodes: model.nodes.map(f) });

const plan = (
  request: ActionRequest,
  next: OracleState,
  requiredSigners: readonly PubKeyHash[],
  payouts: readonly Payout[] = [],
  aggregation: AggregationOutcome | null = null,
): TransitionPlan => ({ request, next, requiredSigners, payouts, aggregation });

/**
 * Decides whether `request` is legal from `state` and, if so, what the state
 * becomes. Pure: no chain access and no transaction construction happen here.
 */
export const checkTransition = (
  state: OracleState,
  request: ActionRequest,
  ctx: TransitionContext,
): Effect.Effect<TransitionPlan, IllegalTransition> =>
  Effect.gen(function* () {
    yield* validateActionRequest(request);
    if (state.lifecycle === "Closed") {
      return yield* illegal(request, "the oracle is closed");
    }
    const model = state.model;
    const settings = model.settings;
    const owners = settings.platform.multisigPkhs;
    const now = BigInt(ctx.now);

    const requireOwner = () =>
      isOwner(settings, ctx.caller)
        ? Effect.void
        : illegal(request, `${ctx.caller} does not hold the owner credential`);

    const requireNode = () =>
      findNode(model, ctx.caller) !== undefined
        ? Effect.void
        : illegal(request, `${ctx.caller} is not a registered node`);

    switch (request.kind) {
      case "NodeUpdate": {
        yield* requireNode();
        const next = mapNodes(model, (n) =>
          n.operator === ctx.caller
            ? { ...n, feed: { value: request.price, lastUpdate: now } }
            : n,
        );
        return plan(request, withModel(state, next), [ctx.caller]);
      }

      case "Aggregate": {
        yield* requireNode();
        const nodeCount = BigInt(model.nodes.length);
        const fresh = model.nodes.filter((n) => isFreshFeed(n, model, now));
        const freshShare =
          (BigInt(fresh.length) * FACTOR_RESOLUTION) / nodeCount;
        if (freshShare < settings.updatedNodes) {
          return yield* illegal(
            request,
            `only ${fresh.length} of ${nodeCount} nodes have fresh feeds`,
          );
        }
        const feeds = fresh.flatMap((n) => (n.feed === null ? [] : [n.feed.value]));
        const outcome = aggregate(
          feeds,
          settings.iqrMultiplier,
          settings.divergence,
        );
        if (outcome === null) {
          return yield* illegal(request, "fresh feeds reach no consensus");
        }
        const previous = model.price;
        const windowExpired =
          previous === null ||
          !(
            previous.timestamp + settings.aggregateTime > now &&
            now > previous.timestamp
          );
        const changedEnough =
          previous === null ||
          previous.price === 0n ||
          ((outcome.median > previous.price
            ? outcome.median - previous.price
            : previous.price - outcome.median) *
            FACTOR_RESOLUTION) /
            previous.price >=
            settings.aggregateChange;
        if (!windowExpired && !changedEnough) {
          return yield* illegal(
            request,
            "the aggregation window is still open and the price did not move enough",
          );
        }
        const fees = aggregationFees(settings.nodeFeePrice, state.feeRate);
        const worstCase =
          fees.nodeFee * nodeCount + fees.aggregateFee + fees.platformFee;
        if (state.reserve < worstCase) {
          return yield* illegal(
            request,
            `reserve ${state.reserve} does not cover the ${worstCase} aggregation fees`,
          );
        }
        const rewarded = fresh
          .filter((n) => {
            const value = n.feed === null ? null : n.feed.value;
            return (
              value !== null && outcome.lower <= value && value <= outcome.upper
            );
          })
          .map((n) => n.operator);
        const charged =
          fees.nodeFee * BigInt(rewarded.length) +
          fees.aggregateFee +
          fees.platformFee;
        const credited = mapNodes(model, (n) => {
          const nodeFee = rewarded.includes(n.operator) ? fees.nodeFee : 0n;
          const aggregatorFee =
            n.operator === ctx.caller ? fees.aggregateFee : 0n;
          return { ...n, reward: n.reward + nodeFee + aggregatorFee };
        });
        const next: OracleModel = {
          ...credited,
          price: {
            price: outcome.median,
            timestamp: now,
            expiry: now + settings.aggregateTime,
          },
          platformReward: model.platformReward + fees.platformFee,
        };
        return plan(
          request,
          withModel(state, next, state.reserve - charged),
          [ctx.caller],
          [],
          {
            median: outcome.median,
            fresh: fresh.map((n) => n.operator),
            rewarded,
            charged,
          },
        );
      }

      case "AddNodes": {
        yield* requireOwner();
        const existing = request.nodes.filter((pkh) =>
          settings.nodeList.includes(pkh),
        );
        if (existing.length > 0) {
          return yield* illegal(
            request,
            `already registered: ${existing.join(", ")}`,
          );
        }
        const next: OracleModel = {
          ...model,
          settings: {
            ...settings,
            nodeList: [...settings.nodeList, ...request.nodes],
          },
          nodes: [
            ...model.nodes,
            ...request.nodes.map((operator) => ({
              operator,
              feed: null,
              reward: 0n,
            })),
          ],
        };
        return plan(request, withModel(state, next), owners);
      }

      case "RemoveNodes": {
        yield* requireOwner();
        const unknown = request.nodes.filter(
          (pkh) => !settings.nodeList.includes(pkh),
        );
        if (unknown.length > 0) {
          return yield* illegal(request, `not registered: ${unknown.join(", ")}`);
        }
        const removed = model.nodes.filter((n) =>
          request.nodes.includes(n.operator),
        );
        const owed = removed.filter((n) => n.reward > 0n);
        if (owed.length > 0 && !request.payoutRewards) {
          return yield* illegal(
            request,
            `unclaimed rewards are not paid out: ${owed
              .map((n) => `${n.operator} holds ${n.reward}`)
              .join(", ")}`,
          );
        }
        const next: OracleModel = {
          ...model,
          settings: {
            ...settings,
            nodeList: settings.nodeList.filter(
              (pkh) => !request.nodes.includes(pkh),
            ),
          },
          nodes: model.nodes.filter((n) => !request.nodes.includes(n.operator)),
        };
        return plan(
          request,
          withModel(state, next),
          owners,
          owed.map((n) => ({
            recipient: { operator: n.operator },
            amount: n.reward,
          })),
        );
      }

      case "AddFunds":
        return plan(
          request,
          withModel(state, model, state.reserve + request.amount),
          [ctx.caller],
        );

      case "EditSettings": {
        yield* requireOwner();
        const problems = settingsProblems(request.settings);
        if (problems.length > 0) {
          return yield* illegal(request, problems.join("; "));
        }
        const sameNodes =
          request.settings.nodeList.length === settings.nodeList.length &&
          request.settings.nodeList.every((pkh, i) => settings.nodeList[i] === pkh);
        if (!sameNodes) {
          return yield* illegal(
            request,
            "the node list can only change through AddNodes or RemoveNodes",
          );
        }
        if (
          encodeAggStateDatum(request.settings) === encodeAggStateDatum(settings)
        ) {
          return yield* illegal(request, "the settings are unchanged");
        }
        return plan(
          request,
          withModel(state, { ...model, settings: request.settings }),
          owners,
        );
      }

      case "NodeCollect": {
        yield* requireNode();
        const node = findNode(model, ctx.caller);
        const reward = node === undefined ? 0n : node.reward;
        if (reward <= 0n) {
          return yield* illegal(request, `${ctx.caller} has no reward to collect`);
        }
        const next = mapNodes(model, (n) =>
          n.operator === ctx.caller ? { ...n, reward: 0n } : n,
        );
        const recipient: PayoutRecipient =
          request.recipient === null
            ? { operator: ctx.caller }
            : { address: request.recipient };
        return plan(request, withModel(state, next), [ctx.caller], [
          { recipient, amount: reward },
        ]);
      }

      case "PlatformCollect": {
        yield* requireOwner();
        if (model.platformReward <= 0n) {
          return yield* illegal(request, "there is no platform reward to collect");
        }
        return plan(
          request,
          withModel(state, { ...model, platformReward: 0n }),
          owners,
          [
            {
              recipient: { address: request.recipient },
              amount: model.platformReward,
            },
          ],
        );
      }

      case "Close": {
        yield* requireOwner();
        const owed = model.nodes.filter((n) => n.reward > 0n);
        if (request.disbursement === "ToOneAddress" && owed.length > 0) {
          return yield* illegal(
            request,
            `node rewards must be zero or paid in the same transaction: ${owed
              .map((n) => n.operator)
              .join(", ")}`,
          );
        }
        const next: OracleState = {
          lifecycle: "Closed",
          model: {
            ...mapNodes(model, (n) => ({ ...n, reward: 0n })),
            platformReward: 0n,
          },
          reserve: 0n,
          feeRate: state.feeRate,
          snapshot: null,
        };
        return plan(
          request,
          next,
          owners,
          owed.map((n) => ({
            recipient: { operator: n.operator },
            amount: n.reward,
          })),
        );
      }

      case "CreateReferenceScript": {
        if (state.snapshot !== null && state.snapshot.referenceScript !== null) {
          return yield* illegal(request, "a reference script UTxO already exists");
        }
        return plan(request, withModel(state, model), [ctx.caller]);
      }
    }
  });

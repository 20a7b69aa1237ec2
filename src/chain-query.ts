import type {
  Address,
  CostModels,
  OutRef,
  Provider,
  UTxO,
  Unit,
} from "@lucid-evolution/lucid";
import { Effect } from "effect";
import {
  compareOutRefs,
  outRefKey,
  quantityOf,
  sortOutRefs,
  toOutRef,
} from "./common.js";
import type { PubKeyHash } from "./common.js";
import {
  decodeAggStateDatum,
  decodeNodeDatum,
  decodeOracleFeedDatum,
  decodeRewardDatum,
} from "./datums.js";
import type { NodeState } from "./datums.js";
import { isOracleScript, oracleScriptHash, stateUnits } from "./deployment.js";
import type { OracleDeployment } from "./deployment.js";
import {
  AmbiguousState,
  ProviderError,
  SchemaMismatch,
  StateNotFound,
} from "./errors.js";
import { assembleOracleModel } from "./oracle-state.js";
import type { OracleState } from "./oracle-state.js";

/**
 * Ledger parameters the builder needs, in the units the fee formula uses.
 */
export type LedgerParameters = {
  readonly minFeeA: bigint;
  readonly minFeeB: bigint;
  readonly coinsPerUtxoByte: bigint;
  readonly priceMem: number;
  readonly priceStep: number;
  readonly maxTxSize: number;
  /** Per-language cost models, hashed into the script data hash. */
  readonly costModels: CostModels;
};

/**
 * Read-only view of the chain. Implementations may be backed by any indexer.
 */
export type ChainProvider = {
  readonly utxosAt: (address: Address) => Promise<UTxO[]>;
  readonly utxosAtWithUnit: (address: Address, unit: Unit) => Promise<UTxO[]>;
  readonly utxosByOutRef: (outRefs: OutRef[]) => Promise<UTxO[]>;
  readonly ledgerParameters: () => Promise<LedgerParameters>;
  /** POSIX time in milliseconds. */
  readonly currentTime: () => Promise<number>;
};

/**
 * Adapts a Lucid `Provider` (Blockfrost, Kupmios, Maestro, Koios, ...).
 */
export const makeProviderChainProvider = (provider: Provider): ChainProvider => ({
  utxosAt: (address) => provider.getUtxos(address),
  utxosAtWithUnit: (address, unit) => provider.getUtxosWithUnit(address, unit),
  utxosByOutRef: (outRefs) => provider.getUtxosByOutRef(outRefs),
  ledgerParameters: async () => {
    const pp = await provider.getProtocolParameters();
    return {
      minFeeA: BigInt(pp.minFeeA),
      minFeeB: BigInt(pp.minFeeB),
      coinsPerUtxoByte: pp.coinsPerUtxoByte,
      priceMem: pp.priceMem,
      priceStep: pp.priceStep,
      maxTxSize: pp.maxTxSize,
      costModels: pp.costModels,
    };
  },
  currentTime: async () => Date.now(),
});

export type ResolveStateError =
  | ProviderError
  | StateNotFound
  | AmbiguousState
  | SchemaMismatch;

export type ChainQuery = {
  readonly deployment: OracleDeployment;
  readonly resolveState: () => Effect.Effect<OracleState, ResolveStateError>;
  /**
   * UTxOs at `address`. When `assetFilter` is given, only UTxOs holding that
   * unit, or any unit of that policy when a bare policy id is given, are
   * returned.
   */
  readonly resolveUtxos: (
    address: Address,
    assetFilter?: string,
  ) => Effect.Effect<UTxO[], ProviderError>;
  readonly resolveReferenceScript: () => Effect.Effect<
    UTxO | null,
    ProviderError | StateNotFound
  >;
  readonly resolveOutRefs: (
    outRefs: readonly OutRef[],
  ) => Effect.Effect<UTxO[], ProviderError>;
  readonly ledgerParameters: () => Effect.Effect<
    LedgerParameters,
    ProviderError
  >;
  readonly currentTime: () => Effect.Effect<number, ProviderError>;
};

const POLICY_ID_HEX_LENGTH = 56;

const holdsPolicy = (utxo: UTxO, policyId: string): boolean =>
  Object.entries(utxo.assets).some(
    ([unit, qty]) => unit.startsWith(policyId) && qty > 0n,
  );

const query = <A>(
  description: string,
  run: () => Promise<A>,
): Effect.Effect<A, ProviderError> =>
  Effect.tryPromise({
    try: run,
    catch: (e) =>
      new ProviderError({
        message: `Failed to fetch ${description}`,
        cause: e,
      }),
  });

const exactlyOne = (
  utxos: readonly UTxO[],
  unit: Unit,
  label: string,
): Effect.Effect<UTxO, StateNotFound | AmbiguousState> => {
  const holders = sortOutRefs(utxos.filter((u) => quantityOf(u.assets, unit) > 0n));
  if (holders.length === 1) {
    return Effect.succeed(holders[0]);
  }
  if (holders.length === 0) {
    return Effect.fail(
      new StateNotFound({
        message: `Failed to find the ${label} UTxO`,
        cause: `No UTxO at the queried address holds ${unit}`,
      }),
    );
  }
  return Effect.fail(
    new AmbiguousState({
      message: `Found ${holders.length} ${label} UTxOs`,
      cause: `Exactly 1 UTxO holding ${unit} was expected`,
      conflicting: holders.map(toOutRef),
    }),
  );
};

const inlineDatumOf = (
  utxo: UTxO,
  label: string,
): Effect.Effect<string, SchemaMismatch> =>
  typeof utxo.datum === "string"
    ? Effect.succeed(utxo.datum)
    : Effect.fail(
        new SchemaMismatch({
          message: `The ${label} UTxO ${outRefKey(utxo)} has no inline datum`,
          cause: utxo.datumHash ?? "missing datum",
        }),
      );

const resolveNodes = (
  utxos: readonly UTxO[],
  nodeFeedUnit: Unit,
): Effect.Effect<
  { states: NodeState[]; byOperator: Record<PubKeyHash, UTxO> },
  SchemaMismatch | AmbiguousState
> =>
  Effect.gen(function* () {
    const nodeUTxOs = sortOutRefs(
      utxos.filter((u) => quantityOf(u.assets, nodeFeedUnit) > 0n),
    );
    const states: NodeState[] = [];
    const byOperator: Record<PubKeyHash, UTxO> = {};
    for (const utxo of nodeUTxOs) {
      const datum = yield* inlineDatumOf(utxo, "node");
      const state = yield* decodeNodeDatum(datum);
      const existing = byOperator[state.operator];
      if (existing !== undefined) {
        return yield* Effect.fail(
          new AmbiguousState({
            message: `Found more than one UTxO for node ${state.operator}`,
            cause: "Exactly 1 node UTxO per operator was expected",
            conflicting: [toOutRef(existing), toOutRef(utxo)],
          }),
        );
      }
      byOperator[state.operator] = utxo;
      states.push(state);
    }
    return { states, byOperator };
  });

type ResolvedRate = {
  readonly utxo: UTxO | null;
  readonly rate: bigint | null;
};

export const makeChainQuery = (
  provider: ChainProvider,
  deployment: OracleDeployment,
): ChainQuery => {
  const units = stateUnits(deployment);

  const currentTime = () => query("the current time", provider.currentTime);

  const ledgerParameters = () =>
    query("ledger parameters", provider.ledgerParameters);

  const resolveUtxos = (address: Address, assetFilter?: string) =>
    Effect.gen(function* () {
      if (assetFilter === undefined) {
        return yield* query(`UTxOs at ${address}`, () =>
          provider.utxosAt(address),
        );
      }
      if (assetFilter.length === POLICY_ID_HEX_LENGTH) {
        const all = yield* query(`UTxOs at ${address}`, () =>
          provider.utxosAt(address),
        );
        return all.filter((u) => holdsPolicy(u, assetFilter));
      }
      return yield* query(`UTxOs at ${address} holding ${assetFilter}`, () =>
        provider.utxosAtWithUnit(address, assetFilter),
      );
    });

  const pickReferenceScript = (utxos: readonly UTxO[]) =>
    Effect.gen(function* () {
      const scriptHash = yield* oracleScriptHash(deployment);
      const candidates = utxos
        .filter((u) => u.scriptRef != null && isOracleScript(u.scriptRef, scriptHash))
        .sort(compareOutRefs);
      return candidates.length > 0 ? candidates[0] : null;
    });

  const resolveReferenceScript = () =>
    Effect.gen(function* () {
      const utxos = yield* resolveUtxos(deployment.oracleAddress);
      return yield* pickReferenceScript(utxos);
    });

  const resolveOutRefs = (outRefs: readonly OutRef[]) =>
    outRefs.length === 0
      ? Effect.succeed([])
      : query(`${outRefs.length} UTxOs by out-ref`, () =>
          provider.utxosByOutRef(outRefs.map(toOutRef)),
        );

  const resolveRate = (): Effect.Effect<ResolvedRate, ResolveStateError> =>
    Effect.gen(function* () {
      const feed = deployment.rateFeed;
      if (feed === undefined) {
        return { utxo: null, rate: null };
      }
      const utxos = yield* resolveUtxos(feed.address, feed.unit);
      const utxo = yield* exactlyOne(utxos, feed.unit, "exchange rate");
      const price = yield* decodeOracleFeedDatum(
        yield* inlineDatumOf(utxo, "exchange rate"),
      );
      if (price === null || price.price <= 0n) {
        return yield* Effect.fail(
          new StateNotFound({
            message: "The exchange rate feed publishes no usable rate",
            cause: price === null ? "No price" : `Rate ${price.price}`,
          }),
        );
      }
      yield* Effect.logDebug(
        `Converting fees at rate ${price.price} from ${outRefKey(utxo)}`,
      );
      return { utxo, rate: price.price };
    });

  const resolveState = () =>
    Effect.gen(function* () {
      const utxos = yield* resolveUtxos(deployment.oracleAddress);
      const observedAt = yield* currentTime();

      const aggState = yield* exactlyOne(utxos, units.aggState, "aggregation state");
      const oracleFeed = yield* exactlyOne(utxos, units.oracleFeed, "oracle feed");
      const reward = yield* exactlyOne(utxos, units.reward, "reward");

      const settings = yield* decodeAggStateDatum(
        yield* inlineDatumOf(aggState, "aggregation state"),
      );
      const price = yield* decodeOracleFeedDatum(
        yield* inlineDatumOf(oracleFeed, "oracle feed"),
      );
      const rewardDatum = yield* decodeRewardDatum(
        yield* inlineDatumOf(reward, "reward"),
      );
      const nodes = yield* resolveNodes(utxos, units.nodeFeed);
      const unlisted = nodes.states.filter(
        (n) => !settings.nodeList.includes(n.operator),
      );
      if (unlisted.length > 0) {
        yield* Effect.logWarning(
          `Ignoring ${unlisted.length} node UTxO(s) of unlisted operators`,
        );
      }
      const model = yield* assembleOracleModel({
        settings,
        price,
        reward: rewardDatum,
        nodes: nodes.states,
      });
      const listedNodes: Record<PubKeyHash, UTxO> = {};
      for (const operator of settings.nodeList) {
        listedNodes[operator] = nodes.byOperator[operator];
      }
      const referenceScript = yield* pickReferenceScript(utxos);
      const rate = yield* resolveRate();

      yield* Effect.logDebug(
        `Resolved oracle state with ${model.nodes.length} node(s) at ${observedAt}`,
      );
      const state: OracleState = {
        lifecycle: "Active",
        model,
        reserve: quantityOf(aggState.assets, deployment.rewardUnit),
        feeRate: rate.rate,
        snapshot: {
          aggState,
          oracleFeed,
          reward,
          nodes: listedNodes,
          referenceScript,
          rateFeed: rate.utxo,
          observedAt,
        },
      };
      return state;
    });

  return {
    deployment,
    resolveState,
    resolveUtxos,
    resolveReferenceScript,
    resolveOutRefs,
    ledgerParameters,
    currentTime,
  };
};

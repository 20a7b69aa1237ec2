import { Constr, Data } from "@lucid-evolution/lucid";
import type { Datum } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import { POSIXTimeSchema, PubKeyHashSchema } from "./common.js";
import { SchemaMismatch } from "./errors.js";

// Constructor tags fixed by the deployed oracle validator.
const ORACLE_FEED_CONSTR = 0;
const NODE_CONSTR = 1;
const AGG_STATE_CONSTR = 2;
const REWARD_CONSTR = 3;
const PRICE_DATA_CONSTR = 2;

const PRICE_KEY = 0n;
const TIMESTAMP_KEY = 1n;
const EXPIRY_KEY = 2n;

export const DataFeedSchema = Data.Object({
  value: Data.Integer(),
  lastUpdate: POSIXTimeSchema,
});
export type DataFeed = Data.Static<typeof DataFeedSchema>;
export const DataFeed = DataFeedSchema as unknown as DataFeed;

export const NodeStateSchema = Data.Object({
  operator: PubKeyHashSchema,
  feed: Data.Nullable(DataFeedSchema),
});
export type NodeState = Data.Static<typeof NodeStateSchema>;
export const NodeState = NodeStateSchema as unknown as NodeState;

export const PriceRewardsSchema = Data.Object({
  nodeFee: Data.Integer(),
  aggregateFee: Data.Integer(),
  platformFee: Data.Integer(),
});

export const OraclePlatformSchema = Data.Object({
  multisigPkhs: Data.Array(PubKeyHashSchema),
  multisigThreshold: Data.Integer(),
});

export const OracleSettingsSchema = Data.Object({
  nodeList: Data.Array(PubKeyHashSchema),
  updatedNodes: Data.Integer(),
  updatedNodeTime: Data.Integer(),
  aggregateTime: Data.Integer(),
  aggregateChange: Data.Integer(),
  minimumDeposit: Data.Integer(),
  nodeFeePrice: PriceRewardsSchema,
  iqrMultiplier: Data.Integer(),
  divergence: Data.Integer(),
  platform: OraclePlatformSchema,
});
export type OracleSettings = Data.Static<typeof OracleSettingsSchema>;
export const OracleSettings = OracleSettingsSchema as unknown as OracleSettings;

export const AggStateSchema = Data.Object({
  settings: OracleSettingsSchema,
});
export type AggState = Data.Static<typeof AggStateSchema>;
export const AggState = AggStateSchema as unknown as AggState;

export const RewardInfoSchema = Data.Object({
  operator: PubKeyHashSchema,
  amount: Data.Integer(),
});

export const OracleRewardSchema = Data.Object({
  nodeRewards: Data.Array(RewardInfoSchema),
  platformReward: Data.Integer(),
});
export type OracleReward = Data.Static<typeof OracleRewardSchema>;
export const OracleReward = OracleRewardSchema as unknown as OracleReward;

/**
 * Aggregated price as stored in the oracle feed datum. On-chain it is a
 * constructor wrapping the map `{0: price, 1: timestamp, 2: expiry}`.
 */
export type PriceData = {
  readonly price: bigint;
  readonly timestamp: bigint;
  readonly expiry: bigint;
};

export type OracleDatum =
  | { readonly kind: "OracleFeed"; readonly price: PriceData | null }
  | { readonly kind: "Node"; readonly node: NodeState }
  | { readonly kind: "AggState"; readonly settings: OracleSettings }
  | { readonly kind: "Reward"; readonly reward: OracleReward };

// ============================================================================
// Encoding
// ============================================================================

const priceDataToData = (price: PriceData): Constr<Data> =>
  new Constr(PRICE_DATA_CONSTR, [
    new Map<Data, Data>([
      [PRICE_KEY, price.price],
      [TIMESTAMP_KEY, price.timestamp],
      [EXPIRY_KEY, price.expiry],
    ]),
  ]);

export const encodeOracleFeedDatum = (price: PriceData | null): Datum =>
  Data.to(
    new Constr(ORACLE_FEED_CONSTR, price === null ? [] : [priceDataToData(price)]),
  );

export const encodeNodeDatum = (node: NodeState): Datum =>
  Data.to(new Constr(NODE_CONSTR, [Data.castTo<NodeState>(node, NodeState)]));

export const encodeAggStateDatum = (settings: OracleSettings): Datum =>
  Data.to(
    new Constr(AGG_STATE_CONSTR, [
      Data.castTo<AggState>({ settings }, AggState),
    ]),
  );

export const encodeRewardDatum = (reward: OracleReward): Datum =>
  Data.to(
    new Constr(REWARD_CONSTR, [Data.castTo<OracleReward>(reward, OracleReward)]),
  );

export const encodeOracleDatum = (datum: OracleDatum): Datum => {
  switch (datum.kind) {
    case "OracleFeed":
      return encodeOracleFeedDatum(datum.price);
    case "Node":
      return encodeNodeDatum(datum.node);
    case "AggState":
      return encodeAggStateDatum(datum.settings);
    case "Reward":
      return encodeRewardDatum(datum.reward);
  }
};

// ============================================================================
// Decoding
// ============================================================================

const mismatch = (what: string, cause: unknown) =>
  new SchemaMismatch({
    message: `Failed to decode the ${what} datum`,
    cause,
  });

const parseConstr = (
  cbor: Datum,
  what: string,
): Effect.Effect<Constr<Data>, SchemaMismatch> =>
  Effect.gen(function* () {
    const data = yield* Effect.try({
      try: () => Data.from(cbor),
      catch: (e) => mismatch(what, e),
    });
    if (!(data instanceof Constr)) {
      return yield* Effect.fail(mismatch(what, "Expected a constructor"));
    }
    return data;
  });

const expectShape = (
  constr: Constr<Data>,
  index: number,
  fieldCount: number,
  what: string,
): Effect.Effect<readonly Data[], SchemaMismatch> =>
  constr.index === index && constr.fields.length === fieldCount
    ? Effect.succeed(constr.fields)
    : Effect.fail(
        mismatch(
          what,
          `Expected constructor ${index} with ${fieldCount} field(s), found constructor ${constr.index} with ${constr.fields.length}`,
        ),
      );

const castField = <T>(
  field: Data,
  schema: T,
  what: string,
): Effect.Effect<T, SchemaMismatch> =>
  Effect.try({
    try: () => Data.castFrom<T>(field, schema),
    catch: (e) => mismatch(what, e),
  });

const readInteger = (
  map: Map<Data, Data>,
  key: bigint,
  what: string,
): Effect.Effect<bigint, SchemaMismatch> => {
  const value = map.get(key);
  return typeof value === "bigint"
    ? Effect.succeed(value)
    : Effect.fail(mismatch(what, `Missing integer entry ${key} in price map`));
};

const priceDataFromData = (
  data: Data,
): Effect.Effect<PriceData, SchemaMismatch> =>
  Effect.gen(function* () {
    const what = "price data";
    if (!(data instanceof Constr)) {
      return yield* Effect.fail(mismatch(what, "Expected a constructor"));
    }
    const [priceMap] = yield* expectShape(data, PRICE_DATA_CONSTR, 1, what);
    if (!(priceMap instanceof Map) || priceMap.size !== 3) {
      return yield* Effect.fail(
        mismatch(what, "Expected a map with exactly three entries"),
      );
    }
    return {
      price: yield* readInteger(priceMap, PRICE_KEY, what),
      timestamp: yield* readInteger(priceMap, TIMESTAMP_KEY, what),
      expiry: yield* readInteger(priceMap, EXPIRY_KEY, what),
    };
  });

const oracleFeedFromConstr = (
  constr: Constr<Data>,
): Effect.Effect<PriceData | null, SchemaMismatch> =>
  Effect.gen(function* () {
    const what = "oracle feed";
    if (constr.index !== ORACLE_FEED_CONSTR || constr.fields.length > 1) {
      return yield* Effect.fail(
        mismatch(
          what,
          `Unexpected constructor ${constr.index} with ${constr.fields.length} field(s)`,
        ),
      );
    }
    if (constr.fields.length === 0) {
      return null;
    }
    return yield* priceDataFromData(constr.fields[0]);
  });

export const decodeOracleFeedDatum = (
  cbor: Datum,
): Effect.Effect<PriceData | null, SchemaMismatch> =>
  Effect.flatMap(parseConstr(cbor, "oracle feed"), oracleFeedFromConstr);

export const decodeNodeDatum = (
  cbor: Datum,
): Effect.Effect<NodeState, SchemaMismatch> =>
  Effect.gen(function* () {
    const constr = yield* parseConstr(cbor, "node");
    const [node] = yield* expectShape(constr, NODE_CONSTR, 1, "node");
    return yield* castField<NodeState>(node, NodeState, "node");
  });

export const decodeAggStateDatum = (
  cbor: Datum,
): Effect.Effect<OracleSettings, SchemaMismatch> =>
  Effect.gen(function* () {
    const constr = yield* parseConstr(cbor, "aggregation state");
    const [aggState] = yield* expectShape(
      constr,
      AGG_STATE_CONSTR,
      1,
      "aggregation state",
    );
    const decoded = yield* castField<AggState>(
      aggState,
      AggState,
      "aggregation state",
    );
    return decoded.settings;
  });

export const decodeRewardDatum = (
  cbor: Datum,
): Effect.Effect<OracleReward, SchemaMismatch> =>
  Effect.gen(function* () {
    const constr = yield* parseConstr(cbor, "reward");
    const [reward] = yield* expectShape(constr, REWARD_CONSTR, 1, "reward");
    return yield* castField<OracleReward>(reward, OracleReward, "reward");
  });

/**
 * Decodes any datum found at the oracle address, dispatching on the
 * top-level constructor tag.
 */
export const decodeOracleDatum = (
  cbor: Datum,
): Effect.Effect<OracleDatum, SchemaMismatch> =>
  Effect.gen(function* () {
    const constr = yield* parseConstr(cbor, "oracle");
    switch (constr.index) {
      case ORACLE_FEED_CONSTR:
        return {
          kind: "OracleFeed",
          price: yield* oracleFeedFromConstr(constr),
        } as const;
      case NODE_CONSTR:
        return { kind: "Node", node: yield* decodeNodeDatum(cbor) } as const;
      case AGG_STATE_CONSTR:
        return {
          kind: "AggState",
          settings: yield* decodeAggStateDatum(cbor),
        } as const;
      case REWARD_CONSTR:
        return {
          kind: "Reward",
          reward: yield* decodeRewardDatum(cbor),
        } as const;
      default:
        return yield* Effect.fail(
          mismatch("oracle", `Unknown constructor ${constr.index}`),
        );
    }
  });

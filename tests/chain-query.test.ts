import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { Effect } from "effect";
import { makeChainQuery } from "@/chain-query.js";
import { encodeNodeDatum } from "@/datums.js";
import { checkMintingPolicy, slotConfigOf } from "@/deployment.js";
import type { OracleModel } from "@/oracle-state.js";
import { makeLedger } from "./ledger.js";
import {
  DEPLOYMENT,
  NOW,
  ORACLE_SCRIPT,
  RATED_DEPLOYMENT,
  REWARD_POLICY,
  REWARD_UNIT,
  UNITS,
  makeActor,
  makeNodes,
  makeSettings,
  seedOracle,
  seedRateFeed,
} from "./utils.js";

const NODES = ["a1", "b2", "c3"].map((b) => b.repeat(28));
const OWNER = "0e".repeat(28);

const MODEL: OracleModel = {
  price: null,
  settings: makeSettings(NODES, [OWNER]),
  nodes: makeNodes(NODES, [10n, null, 12n], NOW, [0n, 4n]),
  platformReward: 1n,
};

const setup = () => {
  const ledger = makeLedger(NOW, slotConfigOf(DEPLOYMENT));
  const query = makeChainQuery(ledger.provider, DEPLOYMENT);
  return { ledger, query };
};

describe("resolveState", () => {
  it.effect("joins the state UTxOs into one model", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      const seeded = seedOracle(ledger, MODEL, 700n);
      const state = yield* query.resolveState();
      expect(state.lifecycle).toBe("Active");
      expect(state.model).toEqual(MODEL);
      expect(state.reserve).toBe(700n);
      expect(state.snapshot?.aggState).toEqual(seeded.aggState);
      expect(state.snapshot?.nodes[NODES[2]]).toEqual(seeded.nodes[2]);
      expect(state.snapshot?.referenceScript).toBeNull();
      expect(state.snapshot?.observedAt).toBe(NOW);
    }),
  );

  it.effect("fails when the oracle is not deployed", () =>
    Effect.gen(function* () {
      const { query } = setup();
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("StateNotFound");
      expect(error.message).toBe("Failed to find the aggregation state UTxO");
    }),
  );

  it.effect("refuses two UTxOs carrying the same state marker", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      const seeded = seedOracle(ledger, MODEL, 700n);
      ledger.add({
        address: DEPLOYMENT.oracleAddress,
        assets: seeded.aggState.assets,
        datum: seeded.aggState.datum,
        scriptRef: null,
      });
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("AmbiguousState");
      expect(error.message).toBe("Found 2 aggregation state UTxOs");
    }),
  );

  it.effect("ignores node UTxOs of operators outside the node list", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      seedOracle(ledger, MODEL, 700n);
      ledger.add({
        address: DEPLOYMENT.oracleAddress,
        assets: { lovelace: 3_000_000n, [UNITS.nodeFeed]: 1n },
        datum: encodeNodeDatum({ operator: "ff".repeat(28), feed: null }),
        scriptRef: null,
      });
      const state = yield* query.resolveState();
      expect(state.model.nodes.map((n) => n.operator)).toEqual(NODES);
    }),
  );

  it.effect("fails on a listed node without a UTxO", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      seedOracle(ledger, { ...MODEL, nodes: MODEL.nodes.slice(0, 2) }, 700n);
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("StateNotFound");
      expect(error.message).toBe(`Failed to find the UTxO of node ${NODES[2]}`);
    }),
  );

  it.effect("fails on a reward entry for an unlisted node", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      seedOracle(
        ledger,
        { ...MODEL, settings: makeSettings(NODES.slice(0, 2), [OWNER]) },
        700n,
      );
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("StateNotFound");
      expect(error.message).toBe("Reward ledger does not match the node list");
    }),
  );

  it.effect("fails on a node UTxO without an inline datum", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      seedOracle(ledger, MODEL, 700n);
      const bare = ledger.add({
        address: DEPLOYMENT.oracleAddress,
        assets: { lovelace: 3_000_000n, [UNITS.nodeFeed]: 1n },
        datum: null,
        scriptRef: null,
      });
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("SchemaMismatch");
      expect(error.message).toBe(
        `The node UTxO ${bare.txHash}#0 has no inline datum`,
      );
    }),
  );
});

describe("exchange rate feed", () => {
  const rated = () => {
    const ledger = makeLedger(NOW, slotConfigOf(RATED_DEPLOYMENT));
    const query = makeChainQuery(ledger.provider, RATED_DEPLOYMENT);
    seedOracle(ledger, MODEL, 700n);
    return { ledger, query };
  };

  it.effect("leaves fees unconverted without a configured feed", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      seedOracle(ledger, MODEL, 700n);
      const state = yield* query.resolveState();
      expect(state.feeRate).toBeNull();
      expect(state.snapshot?.rateFeed).toBeNull();
    }),
  );

  it.effect("reads the published rate", () =>
    Effect.gen(function* () {
      const { ledger, query } = rated();
      const feed = seedRateFeed(ledger, 2_500_000n);
      const state = yield* query.resolveState();
      expect(state.feeRate).toBe(2_500_000n);
      expect(state.snapshot?.rateFeed).toEqual(feed);
    }),
  );

  it.effect("fails when the feed UTxO is missing", () =>
    Effect.gen(function* () {
      const { query } = rated();
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("StateNotFound");
      expect(error.message).toBe("Failed to find the exchange rate UTxO");
    }),
  );

  it.effect("fails when the feed publishes no price", () =>
    Effect.gen(function* () {
      const { ledger, query } = rated();
      seedRateFeed(ledger, null);
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("StateNotFound");
      expect(error.message).toBe("The exchange rate feed publishes no usable rate");
      expect(error.cause).toBe("No price");
    }),
  );

  it.effect("fails on a zero rate", () =>
    Effect.gen(function* () {
      const { ledger, query } = rated();
      seedRateFeed(ledger, 0n);
      const error = yield* Effect.flip(query.resolveState());
      expect(error.message).toBe("The exchange rate feed publishes no usable rate");
      expect(error.cause).toBe("Rate 0");
    }),
  );
});

describe("resolveUtxos", () => {
  it.effect("filters by unit or by policy", () =>
    Effect.gen(function* () {
      const { ledger, query } = setup();
      const owner = makeActor();
      const plain = ledger.add({
        address: owner.address,
        assets: { lovelace: 5_000_000n },
      });
      const tokens = ledger.add({
        address: owner.address,
        assets: { lovelace: 2_000_000n, [REWARD_UNIT]: 3n },
      });
      expect(yield* query.resolveUtxos(owner.address)).toEqual([plain, tokens]);
      expect(yield* query.resolveUtxos(owner.address, REWARD_UNIT)).toEqual([tokens]);
      expect(yield* query.resolveUtxos(owner.address, REWARD_POLICY)).toEqual([tokens]);
      expect(yield* query.resolveUtxos(owner.address, "dd".repeat(28))).toEqual([]);
    }),
  );

  it.effect("reports provider failures", () =>
    Effect.gen(function* () {
      const { ledger } = setup();
      const query = makeChainQuery(
        {
          ...ledger.provider,
          utxosAt: () => Promise.reject(new Error("timeout")),
        },
        DEPLOYMENT,
      );
      const error = yield* Effect.flip(query.resolveState());
      expect(error._tag).toBe("ProviderError");
      expect(error.message).toBe(
        `Failed to fetch UTxOs at ${DEPLOYMENT.oracleAddress}`,
      );
    }),
  );
});

describe("checkMintingPolicy", () => {
  it.effect("accepts a policy hashing to the configured policy id", () =>
    checkMintingPolicy(DEPLOYMENT),
  );

  it.effect("refuses a policy of another id", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        checkMintingPolicy({ ...DEPLOYMENT, mintingPolicy: ORACLE_SCRIPT }),
      );
      expect(error._tag).toBe("ConfigError");
      expect(error.message).toBe(
        "Minting policy does not match the oracle policy id",
      );
      expect(error.fieldsAndValues).toEqual([
        ["ORACLE_POLICY_ID", DEPLOYMENT.policyId],
        ["MINTING_POLICY_TYPE", "PlutusV2"],
      ]);
    }),
  );
});

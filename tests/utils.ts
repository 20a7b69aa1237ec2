import {
  CML,
  fromText,
  mintingPolicyToId,
  toUnit,
  validatorToAddress,
} from "@lucid-evolution/lucid";
import type { Address, Assets, Script, UTxO } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import type { ActionRequest } from "@/action-request.js";
import { makeChainQuery } from "@/chain-query.js";
import type { ChainQuery } from "@/chain-query.js";
import type { PubKeyHash } from "@/common.js";
import { encodeOracleFeedDatum } from "@/datums.js";
import type { OracleSettings, PriceData } from "@/datums.js";
import { keyHashAddress, slotConfigOf, stateUnits } from "@/deployment.js";
import type { OracleDeployment } from "@/deployment.js";
import { encodeOracleModel } from "@/oracle-state.js";
import type { NodeEntry, OracleModel, OracleState } from "@/oracle-state.js";
import { keyHashOf } from "@/services/signer.js";
import type { PrivateKey } from "@/services/signer.js";
import { makeSubmissionGate } from "@/submission-gate.js";
import type { SubmissionGate } from "@/submission-gate.js";
import { makeWitness } from "@/transaction.js";
import type { Transaction } from "@/transaction.js";
import { rewardTotal } from "@/tx-builder/common.js";
import { resolveAndBuildProgram } from "@/tx-builder/index.js";
import type { BuildResult, Caller } from "@/tx-builder/index.js";
import { makeLedger } from "./ledger.js";
import type { Ledger } from "./ledger.js";

export const NOW = 1_750_000_000_000;

// Small well-formed Plutus programs; the ledger stand-in never runs them.
export const ORACLE_SCRIPT: Script = {
  type: "PlutusV2",
  script: "4e4d01000033222220051200120011",
};

export const MINTING_POLICY: Script = {
  type: "PlutusV2",
  script: "4e4d01000033222220051200120012",
};

export const REWARD_POLICY = "cc".repeat(28);
export const REWARD_UNIT = toUnit(REWARD_POLICY, fromText("Credit"));

export const DEPLOYMENT: OracleDeployment = {
  network: "Preprod",
  oracleAddress: validatorToAddress("Preprod", ORACLE_SCRIPT),
  policyId: mintingPolicyToId(MINTING_POLICY),
  rewardUnit: REWARD_UNIT,
  oracleScript: ORACLE_SCRIPT,
  mintingPolicy: MINTING_POLICY,
};

export const UNITS = stateUnits(DEPLOYMENT);

export const RATE_UNIT = toUnit("dd".repeat(28), fromText("Rate"));
export const RATE_ADDRESS = keyHashAddress("Preprod", "ee".repeat(28));

export const RATED_DEPLOYMENT: OracleDeployment = {
  ...DEPLOYMENT,
  rateFeed: { address: RATE_ADDRESS, unit: RATE_UNIT },
};

/**
 * Publishes `rate` from a rate feed UTxO, or a feed with no price when `null`.
 */
export const seedRateFeed = (ledger: Ledger, rate: bigint | null): UTxO =>
  ledger.add({
    address: RATE_ADDRESS,
    assets: { lovelace: 2_000_000n, [RATE_UNIT]: 1n },
    datum: encodeOracleFeedDatum(
      rate === null
        ? null
        : { price: rate, timestamp: BigInt(NOW), expiry: BigInt(NOW + 3_600_000) },
    ),
    scriptRef: null,
  });

export type Actor = {
  readonly key: PrivateKey;
  readonly pubKeyHash: PubKeyHash;
  readonly address: Address;
};

export const makeActor = (): Actor => {
  const key = CML.PrivateKey.generate_ed25519();
  const pubKeyHash = keyHashOf(key);
  return { key, pubKeyHash, address: keyHashAddress("Preprod", pubKeyHash) };
};

export const callerOf = (actor: Actor): Caller => ({
  pubKeyHash: actor.pubKeyHash,
  address: actor.address,
});

export const makeSettings = (
  nodes: readonly PubKeyHash[],
  owners: readonly PubKeyHash[],
  overrides: Partial<OracleSettings> = {},
): OracleSettings => ({
  nodeList: [...nodes],
  updatedNodes: 6_000n,
  updatedNodeTime: 600_000n,
  aggregateTime: 3_600_000n,
  aggregateChange: 100n,
  minimumDeposit: 0n,
  nodeFeePrice: { nodeFee: 10n, aggregateFee: 5n, platformFee: 3n },
  iqrMultiplier: 3n,
  divergence: 1_000n,
  platform: {
    multisigPkhs: [...owners],
    multisigThreshold: BigInt(owners.length),
  },
  ...overrides,
});

export type Feed = bigint | null;

/**
 * Node entries whose feeds were published `age` milliseconds before `now`.
 */
export const makeNodes = (
  operators: readonly PubKeyHash[],
  feeds: readonly Feed[],
  now: number,
  rewards: readonly bigint[] = [],
  age = 60_000,
): NodeEntry[] =>
  operators.map((operator, i) => {
    const value = feeds[i] ?? null;
    return {
      operator,
      feed:
        value === null ? null : { value, lastUpdate: BigInt(now - age) },
      reward: rewards[i] ?? 0n,
    };
  });

export const makeState = (
  model: OracleModel,
  reserve: bigint,
  feeRate: bigint | null = null,
): OracleState => ({
  lifecycle: "Active",
  model,
  reserve,
  feeRate,
  snapshot: null,
});

const withReward = (lovelace: bigint, qty: bigint, marker: string): Assets =>
  qty > 0n
    ? { lovelace, [marker]: 1n, [REWARD_UNIT]: qty }
    : { lovelace, [marker]: 1n };

/**
 * Places the UTxOs of `model` at the oracle address.
 */
export const seedOracle = (
  ledger: Ledger,
  model: OracleModel,
  reserve: bigint,
  options: { readonly referenceScript?: boolean } = {},
) => {
  const encoded = encodeOracleModel(model);
  const at = (assets: Assets, datum: string): Omit<UTxO, "txHash" | "outputIndex"> => ({
    address: DEPLOYMENT.oracleAddress,
    assets,
    datum,
    scriptRef: null,
  });
  const aggState = ledger.add(
    at(withReward(5_000_000n, reserve, UNITS.aggState), encoded.aggState),
  );
  const oracleFeed = ledger.add(
    at({ lovelace: 5_000_000n, [UNITS.oracleFeed]: 1n }, encoded.oracleFeed),
  );
  const reward = ledger.add(
    at(withReward(5_000_000n, rewardTotal(model), UNITS.reward), encoded.reward),
  );
  const nodes = model.nodes.map((_, i) =>
    ledger.add(
      at({ lovelace: 3_000_000n, [UNITS.nodeFeed]: 1n }, encoded.nodes[i]),
    ),
  );
  const referenceScript =
    options.referenceScript === true
      ? ledger.add({
          address: DEPLOYMENT.oracleAddress,
          assets: { lovelace: 64_000_000n },
          datum: null,
          scriptRef: ORACLE_SCRIPT,
        })
      : null;
  return { aggState, oracleFeed, reward, nodes, referenceScript };
};

export const fundWallet = (ledger: Ledger, actor: Actor, extra: Assets = {}) => {
  ledger.add({ address: actor.address, assets: { lovelace: 100_000_000n } });
  ledger.add({ address: actor.address, assets: { lovelace: 10_000_000n } });
  if (Object.keys(extra).length > 0) {
    ledger.add({
      address: actor.address,
      assets: { lovelace: 2_000_000n, ...extra },
    });
  }
};

export type HarnessOptions = {
  readonly feeds?: readonly Feed[];
  readonly rewards?: readonly bigint[];
  readonly platformReward?: bigint;
  readonly price?: PriceData | null;
  readonly reserve?: bigint;
  readonly referenceScript?: boolean;
  readonly settings?: Partial<OracleSettings>;
  /** Publishes this exchange rate and converts fees at it. */
  readonly feeRate?: bigint;
};

export type Harness = {
  readonly ledger: Ledger;
  readonly query: ChainQuery;
  readonly gate: SubmissionGate;
  readonly owners: readonly Actor[];
  readonly nodes: readonly Actor[];
  readonly funder: Actor;
  readonly actorOf: (pkh: PubKeyHash) => Actor;
};

/**
 * Two owners, five funded nodes and a funder holding reward tokens, around an
 * oracle seeded on an in-process ledger.
 */
export const makeHarness = (options: HarnessOptions = {}): Harness => {
  const ledger = makeLedger(NOW, slotConfigOf(DEPLOYMENT));
  const owners = [makeActor(), makeActor()];
  const nodes = Array.from({ length: 5 }, makeActor);
  const funder = makeActor();
  const everyone = [...owners, ...nodes, funder];
  for (const actor of [...owners, ...nodes]) {
    fundWallet(ledger, actor);
  }
  fundWallet(ledger, funder, { [REWARD_UNIT]: 10_000n });

  const operators = nodes.map((n) => n.pubKeyHash);
  const model: OracleModel = {
    price: options.price ?? null,
    settings: makeSettings(
      operators,
      owners.map((o) => o.pubKeyHash),
      options.settings,
    ),
    nodes: makeNodes(operators, options.feeds ?? [], NOW, options.rewards),
    platformReward: options.platformReward ?? 0n,
  };
  seedOracle(ledger, model, options.reserve ?? 1_000n, {
    referenceScript: options.referenceScript,
  });

  if (options.feeRate !== undefined) {
    seedRateFeed(ledger, options.feeRate);
  }

  const actorOf = (pkh: PubKeyHash): Actor => {
    const actor = everyone.find((a) => a.pubKeyHash === pkh);
    if (actor === undefined) {
      throw new Error(`No test key for ${pkh}`);
    }
    return actor;
  };

  return {
    ledger,
    query: makeChainQuery(
      ledger.provider,
      options.feeRate === undefined ? DEPLOYMENT : RATED_DEPLOYMENT,
    ),
    gate: makeSubmissionGate(ledger.submitter, {
      retryAttempts: 3,
      initialRetryMs: 1,
      confirmationTimeoutMs: 1_000,
      confirmationPollMs: 1,
    }),
    owners,
    nodes,
    funder,
    actorOf,
  };
};

/**
 * Attaches a witness from every required signer.
 */
export const signAll = (h: Harness, result: BuildResult): Transaction => ({
  body: result.tx.body,
  witnesses: result.requiredSigners.map((pkh) =>
    makeWitness(result.txHash, h.actorOf(pkh).key),
  ),
});

export const buildAs = (h: Harness, actor: Actor, request: ActionRequest) =>
  resolveAndBuildProgram(h.query, request, callerOf(actor));

/**
 * Builds against a freshly resolved state, signs with every required key and
 * submits.
 */
export const execute = (h: Harness, actor: Actor, request: ActionRequest) =>
  Effect.gen(function* () {
    const result = yield* buildAs(h, actor, request);
    yield* h.gate.submit(signAll(h, result));
    return result;
  });

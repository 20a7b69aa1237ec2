import { fromText } from "@lucid-evolution/lucid";

export const NODE_FEED_ASSET_NAME = fromText("NodeFeed");

export const AGG_STATE_ASSET_NAME = fromText("AggState");

export const ORACLE_FEED_ASSET_NAME = fromText("OracleFeed");

export const REWARD_ASSET_NAME = fromText("Reward");

// Percentages and divergences in settings are expressed in ten-thousandths.
export const FACTOR_RESOLUTION = 10_000n;

// Exchange rates read from a rate feed are fixed-point with six decimals.
export const COIN_PRECISION = 1_000_000n;

// Node UTxOs and reward payouts carry this much lovelace next to their tokens.
export const NODE_OUTPUT_LOVELACE = 2_000_000n;

export const REFERENCE_SCRIPT_LOVELACE = 64_000_000n;

export const COLLATERAL_LOVELACE = 5_000_000n;

// Babbage-era per-output overhead added to the serialized size before
// multiplying by `coinsPerUtxoByte`.
export const MIN_UTXO_OVERHEAD_BYTES = 160n;

export const MAX_FEE_ITERATIONS = 10;

// Execution budget reserved for every redeemer, since the validator is not
// evaluated locally.
export const REDEEMER_EX_UNITS = {
  mem: 3_500_000,
  steps: 1_400_000_000,
} as const;

export const DEFAULT_TX_VALIDITY_MS = 180_000;

export const ENVELOPE_VERSION = 1;

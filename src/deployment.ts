import {
  credentialToAddress,
  getAddressDetails,
  keyHashToCredential,
  mintingPolicyToId,
  toUnit,
  validatorToScriptHash,
} from "@lucid-evolution/lucid";
import type {
  Address,
  Network,
  PolicyId,
  Script,
  ScriptHash,
  Unit,
} from "@lucid-evolution/lucid";
import { Effect } from "effect";
import type { PubKeyHash } from "./common.js";
import {
  AGG_STATE_ASSET_NAME,
  NODE_FEED_ASSET_NAME,
  ORACLE_FEED_ASSET_NAME,
  REWARD_ASSET_NAME,
} from "./constants.js";
import { ConfigError, StateNotFound } from "./errors.js";
import { getSlotConfig } from "./network.js";
import type { SlotConfig } from "./network.js";

/**
 * Another oracle's feed publishing the exchange rate between the currency the
 * settings price fees in and the reward token.
 */
export type RateFeed = {
  readonly address: Address;
  /** Unit of the NFT marking the rate UTxO. */
  readonly unit: Unit;
};

/**
 * Where a deployed oracle lives and the scripts that guard it. The oracle
 * script itself is optional when a reference script UTxO has been published.
 */
export type OracleDeployment = {
  readonly network: Network;
  readonly oracleAddress: Address;
  readonly policyId: PolicyId;
  readonly rewardUnit: Unit;
  readonly oracleScript: Script | null;
  readonly mintingPolicy: Script;
  readonly slotConfig?: SlotConfig;
  /** When set, aggregation fees are converted at the published rate. */
  readonly rateFeed?: RateFeed;
};

export type StateUnits = {
  readonly nodeFeed: Unit;
  readonly aggState: Unit;
  readonly oracleFeed: Unit;
  readonly reward: Unit;
};

export const stateUnits = (deployment: OracleDeployment): StateUnits => ({
  nodeFeed: toUnit(deployment.policyId, NODE_FEED_ASSET_NAME),
  aggState: toUnit(deployment.policyId, AGG_STATE_ASSET_NAME),
  oracleFeed: toUnit(deployment.policyId, ORACLE_FEED_ASSET_NAME),
  reward: toUnit(deployment.policyId, REWARD_ASSET_NAME),
});

export const slotConfigOf = (deployment: OracleDeployment): SlotConfig =>
  deployment.slotConfig ?? getSlotConfig(deployment.network);

/**
 * Script hash guarding the oracle address, read from its payment credential.
 */
export const oracleScriptHash = (
  deployment: OracleDeployment,
): Effect.Effect<ScriptHash, StateNotFound> =>
  Effect.gen(function* () {
    const details = yield* Effect.try({
      try: () => getAddressDetails(deployment.oracleAddress),
      catch: (e) =>
        new StateNotFound({
          message: `Invalid oracle address ${deployment.oracleAddress}`,
          cause: e,
        }),
    });
    const credential = details.paymentCredential;
    if (credential === undefined || credential.type !== "Script") {
      return yield* Effect.fail(
        new StateNotFound({
          message: "Oracle address is not guarded by a script",
          cause: deployment.oracleAddress,
        }),
      );
    }
    return credential.hash;
  });

export const isOracleScript = (script: Script, hash: ScriptHash): boolean =>
  validatorToScriptHash(script) === hash;

/**
 * Fails when the configured minting policy does not hash to the configured
 * policy id, which would make every mint or burn invalid.
 */
export const checkMintingPolicy = (
  deployment: OracleDeployment,
): Effect.Effect<void, ConfigError> =>
  Effect.gen(function* () {
    const actual = mintingPolicyToId(deployment.mintingPolicy);
    if (actual !== deployment.policyId) {
      return yield* Effect.fail(
        new ConfigError({
          message: "Minting policy does not match the oracle policy id",
          cause: `The configured policy hashes to ${actual}`,
          fieldsAndValues: [
            ["ORACLE_POLICY_ID", deployment.policyId],
            ["MINTING_POLICY_TYPE", deployment.mintingPolicy.type],
          ],
        }),
      );
    }
  });

/**
 * Enterprise address of a key hash, used for node and platform payouts.
 */
export const keyHashAddress = (network: Network, pkh: PubKeyHash): Address =>
  credentialToAddress(network, keyHashToCredential(pkh));

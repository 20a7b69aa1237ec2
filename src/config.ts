import type { Address, Network, PolicyId, Script, Unit } from "@lucid-evolution/lucid";
import {
  Config,
  Context,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
  Redacted,
} from "effect";
import { isHexString } from "./common.js";
import { DEFAULT_TX_VALIDITY_MS } from "./constants.js";
import type { OracleDeployment, RateFeed } from "./deployment.js";

const SUPPORTED_PROVIDERS = ["Blockfrost", "Kupmios"] as const;
export type ProviderName = (typeof SUPPORTED_PROVIDERS)[number];

const MINTING_POLICY_TYPES = ["Native", "PlutusV2", "PlutusV3"] as const;
export type MintingPolicyType = (typeof MINTING_POLICY_TYPES)[number];

export type OracleConfigDep = {
  readonly NETWORK: Exclude<Network, "Custom">;
  readonly L1_PROVIDER: ProviderName;
  readonly L1_BLOCKFROST_API_URL: string;
  readonly L1_BLOCKFROST_KEY: Redacted.Redacted;
  readonly L1_KUPO_URL: string;
  readonly L1_OGMIOS_URL: string;
  readonly SUBMIT_API_URL: Option.Option<string>;
  readonly ORACLE_ADDRESS: Address;
  readonly ORACLE_POLICY_ID: PolicyId;
  readonly REWARD_UNIT: Unit;
  readonly ORACLE_SCRIPT_CBOR: Option.Option<string>;
  readonly MINTING_POLICY_CBOR: string;
  readonly MINTING_POLICY_TYPE: MintingPolicyType;
  readonly RATE_FEED: Option.Option<RateFeed>;
  readonly SESSION_DIR: string;
  readonly SIGNER_ADDRESS: Option.Option<Address>;
  readonly SIGNING_KEY: Option.Option<Redacted.Redacted>;
  readonly TX_VALIDITY_MS: number;
  readonly LOG_LEVEL: LogLevel.LogLevel;
};

const hexConfig = (name: string, length?: number): Config.Config<string> =>
  Config.string(name).pipe(
    Config.validate({
      message:
        length === undefined
          ? `${name} must be a hex string`
          : `${name} must be a ${length}-character hex string`,
      validation: (s) =>
        isHexString(s) && (length === undefined || s.length === length),
    }),
  );

// A reward unit is a policy id followed by an optional asset name.
const rewardUnitConfig: Config.Config<Unit> = Config.string("REWARD_UNIT").pipe(
  Config.validate({
    message:
      "REWARD_UNIT must be a native token unit (policy id and asset name), not lovelace",
    validation: (s) => s.length >= 56 && s.length <= 120 && isHexString(s),
  }),
);

export const makeConfig = Effect.gen(function* () {
  return yield* Config.all({
    NETWORK: Config.literal("Mainnet", "Preprod", "Preview")("NETWORK"),
    L1_PROVIDER: Config.literal(...SUPPORTED_PROVIDERS)("L1_PROVIDER").pipe(
      Config.withDefault("Blockfrost" as const),
    ),
    L1_BLOCKFROST_API_URL: Config.string("L1_BLOCKFROST_API_URL").pipe(
      Config.withDefault(""),
    ),
    L1_BLOCKFROST_KEY: Config.redacted("L1_BLOCKFROST_KEY").pipe(
      Config.withDefault(Redacted.make("")),
    ),
    L1_KUPO_URL: Config.string("L1_KUPO_URL").pipe(Config.withDefault("")),
    L1_OGMIOS_URL: Config.string("L1_OGMIOS_URL").pipe(Config.withDefault("")),
    SUBMIT_API_URL: Config.option(Config.string("SUBMIT_API_URL")),
    ORACLE_ADDRESS: Config.string("ORACLE_ADDRESS"),
    ORACLE_POLICY_ID: hexConfig("ORACLE_POLICY_ID", 56),
    REWARD_UNIT: rewardUnitConfig,
    ORACLE_SCRIPT_CBOR: Config.option(hexConfig("ORACLE_SCRIPT_CBOR")),
    MINTING_POLICY_CBOR: hexConfig("MINTING_POLICY_CBOR"),
    MINTING_POLICY_TYPE: Config.literal(...MINTING_POLICY_TYPES)(
      "MINTING_POLICY_TYPE",
    ).pipe(Config.withDefault("PlutusV2" as const)),
    // Read only when both RATE_FEED_ADDRESS and RATE_FEED_UNIT are set.
    RATE_FEED: Config.option(
      Config.all({
        address: Config.string("RATE_FEED_ADDRESS"),
        unit: hexConfig("RATE_FEED_UNIT"),
      }),
    ),
    SESSION_DIR: Config.string("SESSION_DIR").pipe(
      Config.withDefault("./sessions"),
    ),
    SIGNER_ADDRESS: Config.option(Config.string("SIGNER_ADDRESS")),
    SIGNING_KEY: Config.option(Config.redacted("SIGNING_KEY")),
    TX_VALIDITY_MS: Config.integer("TX_VALIDITY_MS").pipe(
      Config.withDefault(DEFAULT_TX_VALIDITY_MS),
    ),
    LOG_LEVEL: Config.logLevel("LOG_LEVEL").pipe(
      Config.withDefault(LogLevel.Info),
    ),
  });
}).pipe(Effect.orDie);

export class OracleConfig extends Context.Tag("OracleConfig")<
  OracleConfig,
  OracleConfigDep
>() {
  static readonly layer = Layer.effect(OracleConfig, makeConfig);
}

/**
 * The oracle scripts use Plutus V2, so a configured oracle script is always
 * read as one.
 */
export const makeDeployment = (config: OracleConfigDep): OracleDeployment => {
  const mintingPolicy: Script = {
    type: config.MINTING_POLICY_TYPE,
    script: config.MINTING_POLICY_CBOR,
  };
  return {
    network: config.NETWORK,
    oracleAddress: config.ORACLE_ADDRESS,
    policyId: config.ORACLE_POLICY_ID,
    rewardUnit: config.REWARD_UNIT,
    oracleScript: Option.match(config.ORACLE_SCRIPT_CBOR, {
      onNone: () => null,
      onSome: (script): Script => ({ type: "PlutusV2", script }),
    }),
    mintingPolicy,
    rateFeed: Option.getOrUndefined(config.RATE_FEED),
  };
};

/**
 * Applies `LOG_LEVEL` to a program.
 */
export const withConfiguredLogLevel = <A, E, R>(
  program: Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R | OracleConfig> =>
  Effect.gen(function* () {
    const config = yield* OracleConfig;
    return yield* program.pipe(Logger.withMinimumLogLevel(config.LOG_LEVEL));
  });

import * as LE from "@lucid-evolution/lucid";
import { Effect, Redacted } from "effect";
import { makeChainQuery, makeProviderChainProvider } from "../chain-query.js";
import type { ChainQuery } from "../chain-query.js";
import { makeDeployment, OracleConfig } from "../config.js";
import { checkMintingPolicy } from "../deployment.js";
import type { OracleConfigDep } from "../config.js";
import { ConfigError } from "../errors.js";

export const makeProvider = (
  config: OracleConfigDep,
): Effect.Effect<LE.Provider, ConfigError> =>
  Effect.try({
    try: (): LE.Provider => {
      switch (config.L1_PROVIDER) {
        case "Kupmios":
          return new LE.Kupmios(config.L1_KUPO_URL, config.L1_OGMIOS_URL);
        case "Blockfrost":
          return new LE.Blockfrost(
            config.L1_BLOCKFROST_API_URL,
            Redacted.value(config.L1_BLOCKFROST_KEY),
          );
      }
    },
    catch: (e) =>
      new ConfigError({
        message: "An error occurred on provider initialization",
        cause: e,
        fieldsAndValues: [
          ["L1_PROVIDER", config.L1_PROVIDER],
          ["NETWORK", config.NETWORK],
        ],
      }),
  });

const makeChain = Effect.gen(function* () {
  const config = yield* OracleConfig;
  yield* Effect.logDebug(`Connecting to ${config.L1_PROVIDER}...`);
  const deployment = makeDeployment(config);
  yield* checkMintingPolicy(deployment);
  const provider = yield* makeProvider(config);
  const query: ChainQuery = makeChainQuery(
    makeProviderChainProvider(provider),
    deployment,
  );
  return { provider, query };
});

export class Chain extends Effect.Service<Chain>()("Chain", {
  effect: makeChain,
  dependencies: [OracleConfig.layer],
}) {}

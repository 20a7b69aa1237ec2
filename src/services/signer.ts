import { CML, fromHex, toHex } from "@lucid-evolution/lucid";
import { Effect, Option, Redacted } from "effect";
import type { PubKeyHash } from "../common.js";
import { OracleConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { makeWitness } from "../transaction.js";
import type { VKeyWitness } from "../transaction.js";

export type PrivateKey = InstanceType<typeof CML.PrivateKey>;

/**
 * Reads an `ed25519_sk` bech32 key or 32 raw bytes in hex.
 */
export const parseSigningKey = (
  encoded: string,
): Effect.Effect<PrivateKey, ConfigError> =>
  Effect.try({
    try: () =>
      encoded.startsWith("ed25519")
        ? CML.PrivateKey.from_bech32(encoded)
        : CML.PrivateKey.from_normal_bytes(fromHex(encoded)),
    catch: (e) =>
      new ConfigError({
        message: "Failed to parse SIGNING_KEY",
        cause: e,
        fieldsAndValues: [["SIGNING_KEY", "<redacted>"]],
      }),
  });

export const keyHashOf = (key: PrivateKey): PubKeyHash =>
  toHex(key.to_public().hash().to_raw_bytes());

const makeSigner = Effect.gen(function* () {
  const config = yield* OracleConfig;
  const encoded = yield* Option.match(config.SIGNING_KEY, {
    onNone: () =>
      Effect.fail(
        new ConfigError({
          message: "SIGNING_KEY is required to sign",
          cause: "Missing environment variable",
          fieldsAndValues: [["SIGNING_KEY", ""]],
        }),
      ),
    onSome: (key) => Effect.succeed(Redacted.value(key)),
  });
  const key = yield* parseSigningKey(encoded);
  const pubKeyHash = keyHashOf(key);
  return {
    pubKeyHash,
    sign: (txHash: string): VKeyWitness => makeWitness(txHash, key),
  };
});

export class Signer extends Effect.Service<Signer>()("Signer", {
  effect: makeSigner,
  dependencies: [OracleConfig.layer],
}) {}

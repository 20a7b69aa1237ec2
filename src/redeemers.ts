import { Constr, Data } from "@lucid-evolution/lucid";
import type { Redeemer } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import { SchemaMismatch } from "./errors.js";

// Declaration order gives the constructor index expected by the validator.
export const OracleRedeemerSchema = Data.Enum([
  Data.Literal("NodeUpdate"),
  Data.Literal("NodeCollect"),
  Data.Literal("PlatformCollect"),
  Data.Literal("Aggregate"),
  Data.Literal("UpdateSettings"),
  Data.Literal("AddNodes"),
  Data.Literal("RemoveNodes"),
  Data.Literal("OracleClose"),
  Data.Literal("AddFunds"),
]);
export type OracleRedeemer = Data.Static<typeof OracleRedeemerSchema>;
export const OracleRedeemer = OracleRedeemerSchema as unknown as OracleRedeemer;

export const encodeOracleRedeemer = (redeemer: OracleRedeemer): Redeemer =>
  Data.to<OracleRedeemer>(redeemer, OracleRedeemer);

export const decodeOracleRedeemer = (
  cbor: Redeemer,
): Effect.Effect<OracleRedeemer, SchemaMismatch> =>
  Effect.try({
    try: () => Data.from(cbor, OracleRedeemer),
    catch: (e) =>
      new SchemaMismatch({
        message: "Failed to decode the oracle redeemer",
        cause: e,
      }),
  });

/**
 * The minting policy's only redeemer, `MintToken`. A one-constructor enum
 * schema reads as unit, so the constructor is written out directly.
 */
export const mintTokenRedeemer = (): Redeemer => Data.to(new Constr(0, []));

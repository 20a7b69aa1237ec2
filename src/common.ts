import { Data } from "@lucid-evolution/lucid";
import type { Assets, OutRef, UTxO, Unit } from "@lucid-evolution/lucid";
import { blake2b } from "@noble/hashes/blake2.js";
import { Effect } from "effect";

export const makeReturn = <A, E>(program: Effect.Effect<A, E>) => {
  return {
    unsafeRun: () => Effect.runPromise(program),
    safeRun: () => Effect.runPromise(Effect.either(program)),
    program: () => program,
  };
};

export const isHexString = (str: string): boolean => {
  const hexRegex = /^[0-9A-Fa-f]*$/;
  return str.length % 2 === 0 && hexRegex.test(str);
};

export const PubKeyHashSchema = Data.Bytes({ minLength: 28, maxLength: 28 });
export type PubKeyHash = Data.Static<typeof PubKeyHashSchema>;
export const PubKeyHash = PubKeyHashSchema as unknown as PubKeyHash;

export const POSIXTimeSchema = Data.Integer();

export const isPubKeyHash = (str: string): boolean =>
  str.length === 56 && isHexString(str);

// Hashing

export const blake2b224 = (bytes: Uint8Array): Uint8Array =>
  blake2b(bytes, { dkLen: 28 });

// Output references

export const outRefKey = (ref: OutRef): string =>
  `${ref.txHash}#${ref.outputIndex}`;

export const toOutRef = (utxo: OutRef): OutRef => ({
  txHash: utxo.txHash,
  outputIndex: utxo.outputIndex,
});

export const outRefsAreEqual = (a: OutRef, b: OutRef): boolean =>
  a.txHash === b.txHash && a.outputIndex === b.outputIndex;

/**
 * Ledger ordering of transaction inputs: lexicographic on the transaction
 * hash, then numeric on the output index.
 */
export const compareOutRefs = (a: OutRef, b: OutRef): number => {
  if (a.txHash < b.txHash) return -1;
  if (a.txHash > b.txHash) return 1;
  return a.outputIndex - b.outputIndex;
};

export const sortOutRefs = <T extends OutRef>(refs: readonly T[]): T[] =>
  [...refs].sort(compareOutRefs);

export const containsOutRef = (
  refs: readonly OutRef[],
  ref: OutRef,
): boolean => refs.some((r) => outRefsAreEqual(r, ref));

// Asset arithmetic. Every helper returns a fresh object without zero entries.

export const quantityOf = (assets: Assets, unit: Unit): bigint =>
  assets[unit] ?? 0n;

export const lovelaceOf = (assets: Assets): bigint =>
  quantityOf(assets, "lovelace");

const normalizeAssets = (assets: Assets): Assets => {
  const result: Assets = {};
  for (const unit of Object.keys(assets).sort()) {
    const qty = assets[unit];
    if (qty !== undefined && qty !== 0n) {
      result[unit] = qty;
    }
  }
  return result;
};

export const addAssets = (...all: readonly Assets[]): Assets => {
  const result: Assets = {};
  for (const assets of all) {
    for (const [unit, qty] of Object.entries(assets)) {
      result[unit] = (result[unit] ?? 0n) + qty;
    }
  }
  return normalizeAssets(result);
};

export const negateAssets = (assets: Assets): Assets => {
  const result: Assets = {};
  for (const [unit, qty] of Object.entries(assets)) {
    result[unit] = -qty;
  }
  return normalizeAssets(result);
};

export const subtractAssets = (a: Assets, b: Assets): Assets =>
  addAssets(a, negateAssets(b));

export const positivePart = (assets: Assets): Assets => {
  const result: Assets = {};
  for (const [unit, qty] of Object.entries(assets)) {
    if (qty > 0n) result[unit] = qty;
  }
  return normalizeAssets(result);
};

export const negativePart = (assets: Assets): Assets =>
  positivePart(negateAssets(assets));

export const isEmptyAssets = (assets: Assets): boolean =>
  Object.values(assets).every((qty) => qty === 0n);

export const sumUTxOAssets = (utxos: readonly UTxO[]): Assets =>
  addAssets(...utxos.map((u) => u.assets));

export const hasOnlyLovelace = (assets: Assets): boolean =>
  Object.entries(assets).every(
    ([unit, qty]) => unit === "lovelace" || qty === 0n,
  );

import type { Address, Assets, OutRef, UTxO, Unit } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import {
  addAssets,
  compareOutRefs,
  containsOutRef,
  hasOnlyLovelace,
  isEmptyAssets,
  lovelaceOf,
  negativePart,
  quantityOf,
  subtractAssets,
  sumUTxOAssets,
} from "./common.js";
import { InsufficientFunds } from "./errors.js";
import { minUtxoLovelace } from "./transaction.js";
import type { TxOutput } from "./transaction.js";

export type SelectionRequest = {
  /** Value the wallet has to contribute. */
  readonly required: Assets;
  /** Value already entering the transaction that no output consumes. */
  readonly surplus: Assets;
  readonly candidates: readonly UTxO[];
  readonly exclude: readonly OutRef[];
  readonly changeAddress: Address;
  readonly coinsPerUtxoByte: bigint;
};

export type Selection = {
  readonly inputs: readonly UTxO[];
  readonly change: TxOutput | null;
  /** Lovelace too small for a change output, paid as extra fee. */
  readonly foldedIntoFee: bigint;
};

const byQuantityDesc =
  (unit: Unit) =>
  (a: UTxO, b: UTxO): number => {
    const qa = quantityOf(a.assets, unit);
    const qb = quantityOf(b.assets, unit);
    if (qa !== qb) return qa > qb ? -1 : 1;
    return compareOutRefs(a, b);
  };

const changeOutput = (address: Address, assets: Assets): TxOutput => ({
  address,
  assets,
  datum: null,
  scriptRef: null,
});

type Settlement =
  | { readonly _tag: "Short"; readonly missing: Assets }
  | { readonly _tag: "Done"; readonly change: TxOutput | null; readonly folded: bigint };

const settle = (
  request: SelectionRequest,
  selected: readonly UTxO[],
): Settlement => {
  const leftover = subtractAssets(
    addAssets(request.surplus, sumUTxOAssets(selected)),
    request.required,
  );
  const missing = negativePart(leftover);
  if (!isEmptyAssets(missing)) {
    return { _tag: "Short", missing };
  }
  if (isEmptyAssets(leftover)) {
    return { _tag: "Done", change: null, folded: 0n };
  }
  const change = changeOutput(request.changeAddress, leftover);
  const minLovelace = minUtxoLovelace(change, request.coinsPerUtxoByte);
  const lovelace = lovelaceOf(leftover);
  if (lovelace >= minLovelace) {
    return { _tag: "Done", change, folded: 0n };
  }
  if (hasOnlyLovelace(leftover)) {
    return { _tag: "Done", change: null, folded: lovelace };
  }
  return { _tag: "Short", missing: { lovelace: minLovelace - lovelace } };
};

/**
 * Largest-first selection. Native assets are covered first, each by the
 * candidates holding most of it, then lovelace. Ties break on out-ref order.
 * UTxOs carrying a script reference are never spent.
 */
export const select = (
  request: SelectionRequest,
): Effect.Effect<Selection, InsufficientFunds> =>
  Effect.gen(function* () {
    const pool = request.candidates.filter(
      (u) => u.scriptRef == null && !containsOutRef(request.exclude, u),
    );
    const selected: UTxO[] = [];
    const take = (utxo: UTxO) => {
      selected.push(utxo);
      pool.splice(pool.indexOf(utxo), 1);
    };

    const tokenUnits = Object.keys(request.required)
      .filter((unit) => unit !== "lovelace")
      .sort();
    for (const unit of tokenUnits) {
      const holders = pool
        .filter((u) => quantityOf(u.assets, unit) > 0n)
        .sort(byQuantityDesc(unit));
      for (const utxo of holders) {
        const have = quantityOf(
          addAssets(request.surplus, sumUTxOAssets(selected)),
          unit,
        );
        if (have >= quantityOf(request.required, unit)) break;
        take(utxo);
      }
    }

    let settlement = settle(request, selected);
    const byLovelace = [...pool].sort(byQuantityDesc("lovelace"));
    for (const utxo of byLovelace) {
      if (settlement._tag === "Done") break;
      take(utxo);
      settlement = settle(request, selected);
    }

    if (settlement._tag === "Short") {
      return yield* Effect.fail(
        new InsufficientFunds({
          message: "Wallet UTxOs do not cover the transaction",
          cause: `Missing ${Object.entries(settlement.missing)
            .map(([unit, qty]) => `${qty} ${unit}`)
            .join(", ")}`,
          missing: settlement.missing,
        }),
      );
    }
    if (settlement.folded > 0n) {
      yield* Effect.logDebug(
        `Folding ${settlement.folded} lovelace of change into the fee`,
      );
    }
    return {
      inputs: [...selected].sort(compareOutRefs),
      change: settlement.change,
      foldedIntoFee: settlement.folded,
    };
  });

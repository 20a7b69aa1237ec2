import type { Address, OutRef } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import type { ChainQuery } from "./chain-query.js";
import {
  containsOutRef,
  isEmptyAssets,
  outRefKey,
  quantityOf,
  toOutRef,
} from "./common.js";
import type { PubKeyHash } from "./common.js";
import { decodeAggStateDatum } from "./datums.js";
import { stateUnits } from "./deployment.js";
import { ProviderError, StaleTransaction, TxValidationError } from "./errors.js";
import { transactionHash, transactionImbalance } from "./transaction.js";
import type { TransactionBody } from "./transaction.js";

export type CosignerCheckOptions = {
  /** Key hash of the cosigner about to sign. */
  readonly signer: PubKeyHash;
  /** Addresses whose UTxOs belong to the cosigner. */
  readonly ownAddresses: readonly Address[];
  /** Whether the transaction may spend the cosigner's own UTxOs. */
  readonly allowOwnInputs: boolean;
  /** Hash the cosigner was told to expect, if any. */
  readonly expectedTxHash?: string;
};

export type CosignerReport = {
  readonly txHash: string;
  readonly oracleExists: boolean;
  readonly ownSignatureRequired: boolean;
  readonly foreignSigners: readonly PubKeyHash[];
  readonly oracleInputs: readonly OutRef[];
  readonly ownInputs: readonly OutRef[];
  readonly ownCollateral: readonly OutRef[];
  readonly balanced: boolean;
};

/**
 * Gathers everything a cosigner needs to know about a transaction someone
 * else built, using the current chain view.
 */
export const inspectTransaction = (
  query: ChainQuery,
  body: TransactionBody,
  options: CosignerCheckOptions,
): Effect.Effect<CosignerReport, ProviderError | StaleTransaction> =>
  Effect.gen(function* () {
    const txHash = transactionHash(body);
    const units = stateUnits(query.deployment);
    const oracleUTxOs = yield* query.resolveUtxos(
      query.deployment.oracleAddress,
      query.deployment.policyId,
    );
    const aggState = oracleUTxOs.find(
      (u) => quantityOf(u.assets, units.aggState) > 0n,
    );
    let platformKeys: readonly PubKeyHash[] = [];
    if (aggState !== undefined && typeof aggState.datum === "string") {
      const settings = yield* Effect.either(decodeAggStateDatum(aggState.datum));
      if (settings._tag === "Right") {
        platformKeys = settings.right.platform.multisigPkhs;
      } else {
        yield* Effect.logWarning(
          `Aggregation state datum does not decode: ${settings.left.message}`,
        );
      }
    }

    const ownUTxOs = (yield* Effect.forEach(options.ownAddresses, (address) =>
      query.resolveUtxos(address),
    )).flat();
    const ownInputs = body.inputs.filter((ref) => containsOutRef(ownUTxOs, ref));
    const ownCollateral = body.collateral.filter((ref) =>
      containsOutRef(ownUTxOs, ref),
    );

    const spent = yield* query.resolveOutRefs(body.inputs);
    const consumed = body.inputs.filter((ref) => !containsOutRef(spent, ref));
    if (consumed.length > 0) {
      return yield* Effect.fail(
        new StaleTransaction({
          message: `Transaction ${txHash} spends outputs that are gone`,
          cause: `Consumed: ${consumed.map(outRefKey).join(", ")}`,
          txHash,
          consumed,
        }),
      );
    }

    return {
      txHash,
      oracleExists: aggState !== undefined,
      ownSignatureRequired: body.requiredSigners.includes(options.signer),
      foreignSigners: body.requiredSigners.filter(
        (pkh) => !platformKeys.includes(pkh),
      ),
      oracleInputs: oracleUTxOs
        .filter((u) => containsOutRef(body.inputs, u))
        .map(toOutRef),
      ownInputs,
      ownCollateral,
      balanced: isEmptyAssets(transactionImbalance(body, spent)),
    };
  });

export const reportProblems = (
  report: CosignerReport,
  options: CosignerCheckOptions,
): string[] => {
  const problems: string[] = [];
  if (!report.oracleExists) {
    problems.push("Oracle does not exist");
  }
  if (report.oracleInputs.length === 0) {
    problems.push("Transaction does not consume any up-to-date oracle inputs");
  }
  if (!options.allowOwnInputs && report.ownInputs.length > 0) {
    problems.push("Transaction contains own wallet inputs");
  }
  if (!options.allowOwnInputs && report.ownCollateral.length > 0) {
    problems.push("Transaction contains own wallet collateral inputs");
  }
  if (!report.ownSignatureRequired) {
    problems.push("Transaction does not require a signature from this wallet");
  }
  if (report.foreignSigners.length > 0) {
    problems.push(
      `Transaction requires signatures outside of the oracle platform: ${report.foreignSigners.join(", ")}`,
    );
  }
  if (!report.balanced) {
    problems.push("Transaction does not balance");
  }
  if (
    options.expectedTxHash !== undefined &&
    options.expectedTxHash !== report.txHash
  ) {
    problems.push(
      `Transaction hash ${report.txHash} differs from the expected ${options.expectedTxHash}`,
    );
  }
  return problems;
};

/**
 * Pre-signing checks run by a cosigner on a transaction received in an
 * envelope. Fails with every violated rule in one error.
 */
export const validateForCosigning = (
  query: ChainQuery,
  body: TransactionBody,
  options: CosignerCheckOptions,
): Effect.Effect<
  CosignerReport,
  TxValidationError | ProviderError | StaleTransaction
> =>
  Effect.gen(function* () {
    const report = yield* inspectTransaction(query, body, options);
    const problems = reportProblems(report, options);
    if (problems.length > 0) {
      return yield* Effect.fail(
        new TxValidationError({
          message: `Refusing to sign ${report.txHash}`,
          cause: problems.join("; "),
        }),
      );
    }
    return report;
  });

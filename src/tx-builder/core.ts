import type { Assets, OutRef, Script, UTxO } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import type { ChainQuery, LedgerParameters } from "../chain-query.js";
import { select } from "../coin-selection.js";
import type { Selection } from "../coin-selection.js";
import {
  addAssets,
  compareOutRefs,
  hasOnlyLovelace,
  isEmptyAssets,
  lovelaceOf,
  negativePart,
  outRefsAreEqual,
  positivePart,
  sortOutRefs,
  subtractAssets,
  sumUTxOAssets,
  toOutRef,
} from "../common.js";
import type { PubKeyHash } from "../common.js";
import {
  COLLATERAL_LOVELACE,
  MAX_FEE_ITERATIONS,
  REDEEMER_EX_UNITS,
} from "../constants.js";
import { slotConfigOf } from "../deployment.js";
import {
  FeeEstimationFailed,
  InsufficientFunds,
  ProviderError,
  StateNotFound,
  TxValidationError,
} from "../errors.js";
import { posixToSlot } from "../network.js";
import { mintTokenRedeemer } from "../redeemers.js";
import {
  minimumFee,
  scriptDataHash,
  transactionHash,
} from "../transaction.js";
import type { TransactionBody, TxRedeemer } from "../transaction.js";
import type {
  BuildOptions,
  BuildResult,
  SkeletonContext,
  TxSkeleton,
} from "./types.js";

export type AssembleError =
  | ProviderError
  | StateNotFound
  | InsufficientFunds
  | FeeEstimationFailed
  | TxValidationError;

type Witnessing = {
  readonly referenceInputs: readonly OutRef[];
  readonly scripts: readonly Script[];
  /** Languages of every Plutus script that runs, attached or referenced. */
  readonly languages: readonly Script["type"][];
  readonly runsPlutus: boolean;
};

const SCRIPT_TYPE_ORDER: readonly Script["type"][] = [
  "Native",
  "PlutusV1",
  "PlutusV2",
  "PlutusV3",
];

// Witness sets group scripts per language, so attached scripts are kept in
// that grouping.
const byScriptType = (a: Script, b: Script): number =>
  SCRIPT_TYPE_ORDER.indexOf(a.type) - SCRIPT_TYPE_ORDER.indexOf(b.type);

/**
 * Decides how the oracle validator and the minting policy are provided: the
 * validator by reference when a reference script UTxO exists, otherwise
 * attached; the minting policy always attached.
 */
const resolveWitnessing = (
  ctx: SkeletonContext,
  skeleton: TxSkeleton,
): Effect.Effect<Witnessing, StateNotFound> =>
  Effect.gen(function* () {
    const referenceInputs: OutRef[] = skeleton.referenceInputs.map(toOutRef);
    const scripts: Script[] = [];
    const languages: Script["type"][] = [];
    const spendsScript = skeleton.scriptInputs.length > 0;
    if (spendsScript) {
      const referenceScript = ctx.snapshot.referenceScript;
      if (referenceScript !== null && referenceScript.scriptRef != null) {
        referenceInputs.push(toOutRef(referenceScript));
        languages.push(referenceScript.scriptRef.type);
      } else if (ctx.deployment.oracleScript !== null) {
        scripts.push(ctx.deployment.oracleScript);
        languages.push(ctx.deployment.oracleScript.type);
      } else {
        return yield* Effect.fail(
          new StateNotFound({
            message: "Failed to find the oracle validator",
            cause: "No reference script UTxO exists and no script is configured",
          }),
        );
      }
    }
    const mints = !isEmptyAssets(skeleton.mint);
    if (mints) {
      scripts.push(ctx.deployment.mintingPolicy);
      languages.push(ctx.deployment.mintingPolicy.type);
    }
    const plutusMint = mints && ctx.deployment.mintingPolicy.type !== "Native";
    return {
      referenceInputs,
      scripts: scripts.sort(byScriptType),
      languages,
      runsPlutus: spendsScript || plutusMint,
    };
  });

/**
 * Smallest pure-lovelace wallet UTxO holding at least the collateral amount.
 */
export const pickCollateral = (
  walletUTxOs: readonly UTxO[],
): Effect.Effect<UTxO, InsufficientFunds> => {
  const candidates = walletUTxOs
    .filter(
      (u) =>
        u.scriptRef == null &&
        hasOnlyLovelace(u.assets) &&
        lovelaceOf(u.assets) >= COLLATERAL_LOVELACE,
    )
    .sort((a, b) => {
      const la = lovelaceOf(a.assets);
      const lb = lovelaceOf(b.assets);
      if (la !== lb) return la < lb ? -1 : 1;
      return compareOutRefs(a, b);
    });
  return candidates.length > 0
    ? Effect.succeed(candidates[0])
    : Effect.fail(
        new InsufficientFunds({
          message: "Failed to find a collateral UTxO",
          cause: `No pure-lovelace wallet UTxO of at least ${COLLATERAL_LOVELACE} lovelace`,
          missing: { lovelace: COLLATERAL_LOVELACE },
        }),
      );
};

const spendRedeemers = (
  ctx: SkeletonContext,
  skeleton: TxSkeleton,
  sortedInputs: readonly OutRef[],
): TxRedeemer[] => {
  const redeemers: TxRedeemer[] = skeleton.scriptInputs.map((input) => ({
    tag: "spend",
    index: sortedInputs.findIndex((ref) => outRefsAreEqual(ref, input.utxo)),
    data: input.redeemer,
    exUnits: REDEEMER_EX_UNITS,
  }));
  if (
    !isEmptyAssets(skeleton.mint) &&
    ctx.deployment.mintingPolicy.type !== "Native"
  ) {
    // A single policy is minted, so its redeemer index is always 0.
    redeemers.push({
      tag: "mint",
      index: 0,
      data: mintTokenRedeemer(),
      exUnits: REDEEMER_EX_UNITS,
    });
  }
  return redeemers.sort((a, b) =>
    a.tag === b.tag ? a.index - b.index : a.tag === "spend" ? -1 : 1,
  );
};

/**
 * Value the skeleton leaves unbalanced at a given fee: script inputs plus
 * mint, minus outputs and fee.
 */
const skeletonBalance = (skeleton: TxSkeleton, fee: bigint): Assets =>
  subtractAssets(
    addAssets(
      sumUTxOAssets(skeleton.scriptInputs.map((i) => i.utxo)),
      skeleton.mint,
    ),
    addAssets(...skeleton.outputs.map((o) => o.assets), { lovelace: fee }),
  );

export const assembleProgram = (
  query: ChainQuery,
  ctx: SkeletonContext,
  skeleton: TxSkeleton,
  options: BuildOptions,
): Effect.Effect<BuildResult, AssembleError> =>
  Effect.gen(function* () {
    const walletUTxOs = yield* query.resolveUtxos(ctx.caller.address);
    const params: LedgerParameters = yield* query.ledgerParameters();
    const witnessing = yield* resolveWitnessing(ctx, skeleton);
    const collateral = witnessing.runsPlutus
      ? [toOutRef(yield* pickCollateral(walletUTxOs))]
      : [];

    const slotConfig = slotConfigOf(ctx.deployment);
    const now = ctx.snapshot.observedAt;
    const validFrom = posixToSlot(now, slotConfig);
    const validTo = posixToSlot(now + options.txValidityMs, slotConfig);

    const requiredSigners: PubKeyHash[] = [
      ...new Set(ctx.plan.requiredSigners),
    ].sort();
    const witnessCount = new Set([...requiredSigners, ctx.caller.pubKeyHash])
      .size;
    const scriptInputRefs = skeleton.scriptInputs.map((i) => toOutRef(i.utxo));

    const assemble = (fee: bigint, selection: Selection): TransactionBody => {
      const inputs = sortOutRefs([
        ...scriptInputRefs,
        ...selection.inputs.map(toOutRef),
      ]);
      const redeemers = spendRedeemers(ctx, skeleton, inputs);
      return {
        inputs,
        referenceInputs: sortOutRefs(witnessing.referenceInputs),
        collateral,
        outputs:
          selection.change === null
            ? skeleton.outputs
            : [...skeleton.outputs, selection.change],
        fee: fee + selection.foldedIntoFee,
        mint: skeleton.mint,
        redeemers,
        requiredSigners,
        validFrom,
        validTo,
        scripts: witnessing.scripts,
        scriptDataHash: scriptDataHash(
          redeemers,
          witnessing.languages,
          params.costModels,
        ),
      };
    };

    const maxIterations = options.maxFeeIterations ?? MAX_FEE_ITERATIONS;
    let fee = 0n;
    let previousSize = -1;
    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      const balance = skeletonBalance(skeleton, fee);
      const selection = yield* select({
        required: negativePart(balance),
        surplus: positivePart(balance),
        candidates: walletUTxOs,
        exclude: scriptInputRefs,
        changeAddress: ctx.caller.address,
        coinsPerUtxoByte: params.coinsPerUtxoByte,
      });
      const body = assemble(fee, selection);
      const { fee: needed, size } = minimumFee(body, witnessCount, params);
      if (body.fee >= needed && size === previousSize) {
        if (size > params.maxTxSize) {
          return yield* Effect.fail(
            new TxValidationError({
              message: "Transaction exceeds the maximum size",
              cause: `${size} > ${params.maxTxSize} bytes`,
            }),
          );
        }
        yield* Effect.logDebug(
          `Fee converged after ${iteration} iteration(s): ${body.fee} lovelace (${size} bytes)`,
        );
        const txHash = transactionHash(body);
        return {
          request: ctx.plan.request,
          tx: { body, witnesses: [] },
          txHash,
          requiredSigners,
          nextState: ctx.plan.next,
          spent: body.inputs,
        };
      }
      fee = needed > fee ? needed : fee;
      previousSize = size;
    }
    return yield* Effect.fail(
      new FeeEstimationFailed({
        message: "Fee calculation failed to converge",
        cause: `No stable fee after ${maxIterations} iterations`,
        iterations: maxIterations,
      }),
    );
  });

import { Duration, Effect, Schedule } from "effect";
import type { ChainQuery } from "./chain-query.js";
import { makeReturn } from "./common.js";
import type { PubKeyHash } from "./common.js";
import {
  ConfirmationError,
  IncompleteSignatures,
  ProviderError,
  SessionNotFound,
  SessionStoreError,
  StaleTransaction,
  SubmissionNetworkError,
  SubmissionRejected,
} from "./errors.js";
import { checkFreshness } from "./signature-coordinator.js";
import type { SessionId, SignatureCoordinator } from "./signature-coordinator.js";
import {
  transactionHash,
  transactionToHex,
  verifyWitness,
  witnessKeyHash,
} from "./transaction.js";
import type { Transaction } from "./transaction.js";

export type SubmitOutcome =
  | { readonly _tag: "Accepted"; readonly txId: string }
  | { readonly _tag: "Rejected"; readonly reason: string };

/**
 * Hands signed transactions to the network. A returned `Rejected` is a
 * definitive ledger verdict; a thrown error is a transport failure.
 */
export type Submitter = {
  readonly submit: (cborHex: string) => Promise<SubmitOutcome>;
  readonly awaitConfirmation?: (
    txId: string,
    checkIntervalMs: number,
  ) => Promise<boolean>;
};

export type SubmissionGateOptions = {
  readonly retryAttempts: number;
  readonly initialRetryMs: number;
  readonly confirmationTimeoutMs: number;
  readonly confirmationPollMs: number;
};

export const DEFAULT_SUBMISSION_OPTIONS: SubmissionGateOptions = {
  retryAttempts: 3,
  initialRetryMs: 2_000,
  confirmationTimeoutMs: 90_000,
  confirmationPollMs: 5_000,
};

const formatSubmitError = (error: unknown): string => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};

/**
 * Submitter for a `cardano-submit-api` style endpoint: the raw transaction is
 * POSTed as `application/cbor`. 4xx answers are ledger rejections, anything
 * else that is not a success is a network failure.
 */
export const makeHttpSubmitter = (url: string): Submitter => ({
  submit: async (cborHex) => {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/cbor" },
      body: Buffer.from(cborHex, "hex"),
    });
    const text = await response.text();
    if (response.ok) {
      return { _tag: "Accepted", txId: text.replace(/"/g, "").trim() };
    }
    if (response.status >= 400 && response.status < 500) {
      return { _tag: "Rejected", reason: text };
    }
    throw new Error(`Submit API answered ${response.status}: ${text}`);
  },
});

/**
 * Signers whose valid witness is missing from `tx`.
 */
export const unsatisfiedSigners = (tx: Transaction): PubKeyHash[] => {
  const txHash = transactionHash(tx.body);
  const signed = new Set(
    tx.witnesses
      .filter((w) => verifyWitness(txHash, w))
      .map(witnessKeyHash),
  );
  return tx.body.requiredSigners.filter((pkh) => !signed.has(pkh));
};

export type SubmissionGate = {
  readonly submit: (
    signed: Transaction,
  ) => Effect.Effect<
    string,
    IncompleteSignatures | SubmissionRejected | SubmissionNetworkError
  >;
  readonly submitSession: (
    coordinator: SignatureCoordinator,
    query: ChainQuery,
    id: SessionId,
  ) => Effect.Effect<
    string,
    | IncompleteSignatures
    | SubmissionRejected
    | SubmissionNetworkError
    | StaleTransaction
    | ProviderError
    | SessionNotFound
    | SessionStoreError
  >;
  readonly awaitConfirmation: (
    txId: string,
  ) => Effect.Effect<void, ConfirmationError>;
};

export const makeSubmissionGate = (
  submitter: Submitter,
  options: SubmissionGateOptions = DEFAULT_SUBMISSION_OPTIONS,
): SubmissionGate => {
  const submit = (signed: Transaction) =>
    Effect.gen(function* () {
      const txHash = transactionHash(signed.body);
      const missing = unsatisfiedSigners(signed);
      if (missing.length > 0) {
        return yield* Effect.fail(
          new IncompleteSignatures({
            message: `Transaction ${txHash} is missing signatures`,
            cause: `Missing: ${missing.join(", ")}`,
            txHash,
            missing,
          }),
        );
      }
      const cborHex = transactionToHex(signed);
      yield* Effect.logInfo(`Submitting transaction ${txHash}...`);
      const attempt = Effect.gen(function* () {
        const outcome = yield* Effect.tryPromise({
          try: () => submitter.submit(cborHex),
          catch: (e) =>
            new SubmissionNetworkError({
              message: `Failed to reach the submit endpoint: ${formatSubmitError(e)}`,
              cause: e,
              txHash,
            }),
        });
        if (outcome._tag === "Rejected") {
          return yield* Effect.fail(
            new SubmissionRejected({
              message: `Transaction ${txHash} was rejected`,
              cause: outcome.reason,
              txHash,
              reason: outcome.reason,
            }),
          );
        }
        return outcome.txId;
      });
      const txId = yield* attempt.pipe(
        Effect.tapError((e) =>
          Effect.logWarning(`Submission of ${txHash} failed: ${e.message}`),
        ),
        Effect.retry({
          schedule: Schedule.compose(
            Schedule.exponential(Duration.millis(options.initialRetryMs)),
            Schedule.recurs(options.retryAttempts),
          ),
          while: (e) => e._tag === "SubmissionNetworkError",
        }),
      );
      if (txId !== "" && txId !== txHash) {
        yield* Effect.logWarning(
          `Submit endpoint reported id ${txId} for transaction ${txHash}`,
        );
      }
      yield* Effect.logInfo(`Transaction submitted: ${txHash}`);
      return txHash;
    });

  const submitSession = (
    coordinator: SignatureCoordinator,
    query: ChainQuery,
    id: SessionId,
  ) =>
    Effect.gen(function* () {
      const status = yield* coordinator.status(id);
      if (status._tag === "Pending") {
        return yield* Effect.fail(
          new IncompleteSignatures({
            message: `Signing session ${id} is not complete`,
            cause: `Missing: ${status.missing.join(", ")}`,
            txHash: id,
            missing: status.missing,
          }),
        );
      }
      yield* checkFreshness(query, status.signedTx.body);
      return yield* submit(status.signedTx);
    });

  const awaitConfirmation = (txId: string) =>
    Effect.gen(function* () {
      const wait = submitter.awaitConfirmation;
      if (wait === undefined) {
        return yield* Effect.fail(
          new ConfirmationError({
            message: `Failed to confirm transaction ${txId}`,
            cause: "The submitter cannot observe confirmations",
            txHash: txId,
          }),
        );
      }
      yield* Effect.logInfo(`Confirming transaction ${txId}...`);
      const confirmed = yield* Effect.tryPromise({
        try: () => wait(txId, options.confirmationPollMs),
        catch: (e) =>
          new ConfirmationError({
            message: `Failed to confirm transaction ${txId}`,
            cause: e,
            txHash: txId,
          }),
      }).pipe(
        Effect.timeoutFail({
          duration: Duration.millis(options.confirmationTimeoutMs),
          onTimeout: () =>
            new ConfirmationError({
              message: `Timed out confirming transaction ${txId}`,
              cause: `No confirmation after ${options.confirmationTimeoutMs}ms`,
              txHash: txId,
            }),
        }),
      );
      if (!confirmed) {
        return yield* Effect.fail(
          new ConfirmationError({
            message: `Transaction ${txId} was not confirmed`,
            cause: "The submitter reported no confirmation",
            txHash: txId,
          }),
        );
      }
      yield* Effect.logInfo(`Transaction confirmed: ${txId}`);
    });

  return { submit, submitSession, awaitConfirmation };
};

export const submit = (gate: SubmissionGate, signed: Transaction) =>
  makeReturn(gate.submit(signed)).unsafeRun();

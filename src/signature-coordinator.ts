import type { OutRef } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import type { ActionRequest } from "./action-request.js";
import type { ChainQuery } from "./chain-query.js";
import { containsOutRef, outRefKey } from "./common.js";
import type { PubKeyHash } from "./common.js";
import { decodeEnvelope, encodeEnvelope } from "./envelope.js";
import {
  CborDeserializationError,
  InvalidWitness,
  ProviderError,
  SchemaMismatch,
  SessionNotFound,
  SessionStoreError,
  StaleTransaction,
  UnexpectedSigner,
} from "./errors.js";
import type { SessionStore, SigningSession } from "./session-store.js";
import {
  transactionHash,
  verifyWitness,
  witnessKeyHash,
} from "./transaction.js";
import type {
  Transaction,
  TransactionBody,
  VKeyWitness,
} from "./transaction.js";

export type SessionId = string;

export type SessionStatus =
  | { readonly _tag: "Pending"; readonly missing: readonly PubKeyHash[] }
  | { readonly _tag: "Complete"; readonly signedTx: Transaction };

export type ContributeError =
  | SessionNotFound
  | UnexpectedSigner
  | InvalidWitness
  | SessionStoreError;

export type ImportError =
  | ContributeError
  | CborDeserializationError
  | SchemaMismatch;

export type SignatureCoordinator = {
  readonly start: (
    tx: Transaction,
    requiredSigners: readonly PubKeyHash[],
    request?: ActionRequest | null,
  ) => Effect.Effect<SessionId, ContributeError>;
  readonly contribute: (
    id: SessionId,
    signer: PubKeyHash,
    witness: VKeyWitness,
  ) => Effect.Effect<SessionStatus, ContributeError>;
  readonly status: (
    id: SessionId,
  ) => Effect.Effect<SessionStatus, SessionNotFound | SessionStoreError>;
  readonly session: (
    id: SessionId,
  ) => Effect.Effect<SigningSession, SessionNotFound | SessionStoreError>;
  readonly exportEnvelope: (
    id: SessionId,
  ) => Effect.Effect<Uint8Array, SessionNotFound | SessionStoreError>;
  readonly importEnvelope: (
    bytes: Uint8Array,
  ) => Effect.Effect<SessionId, ImportError>;
};

export const missingSigners = (session: SigningSession): PubKeyHash[] =>
  session.body.requiredSigners.filter((pkh) => !(pkh in session.witnesses));

export const sessionStatus = (session: SigningSession): SessionStatus => {
  const missing = missingSigners(session);
  if (missing.length > 0) {
    return { _tag: "Pending", missing };
  }
  return {
    _tag: "Complete",
    signedTx: {
      body: session.body,
      witnesses: session.body.requiredSigners.map(
        (pkh) => session.witnesses[pkh],
      ),
    },
  };
};

const checkSignerSet = (
  id: SessionId,
  body: TransactionBody,
  requiredSigners: readonly PubKeyHash[],
): Effect.Effect<void, UnexpectedSigner> => {
  const expected = new Set(body.requiredSigners);
  const given = new Set(requiredSigners);
  const extra = [...given].find((pkh) => !expected.has(pkh));
  if (extra !== undefined) {
    return Effect.fail(
      new UnexpectedSigner({
        message: `${extra} is not a required signer of ${id}`,
        cause: "The signer set differs from the transaction's required signers",
        signer: extra,
      }),
    );
  }
  const absent = [...expected].find((pkh) => !given.has(pkh));
  if (absent !== undefined) {
    return Effect.fail(
      new UnexpectedSigner({
        message: `Required signer ${absent} of ${id} was not listed`,
        cause: "The signer set differs from the transaction's required signers",
        signer: absent,
      }),
    );
  }
  return Effect.void;
};

/**
 * Verifies a witness for `session` and returns the session with it added.
 * A signer that already contributed leaves the session unchanged.
 */
const addWitness = (
  session: SigningSession,
  signer: PubKeyHash,
  witness: VKeyWitness,
): Effect.Effect<SigningSession, UnexpectedSigner | InvalidWitness> =>
  Effect.gen(function* () {
    if (!session.body.requiredSigners.includes(signer)) {
      return yield* Effect.fail(
        new UnexpectedSigner({
          message: `${signer} is not a required signer of ${session.id}`,
          cause: `Expected one of: ${session.body.requiredSigners.join(", ")}`,
          signer,
        }),
      );
    }
    if (signer in session.witnesses) {
      return session;
    }
    const keyHash = witnessKeyHash(witness);
    if (keyHash !== signer) {
      return yield* Effect.fail(
        new InvalidWitness({
          message: `Witness for ${signer} was made with another key`,
          cause: `The witness key hashes to ${keyHash}`,
          signer,
        }),
      );
    }
    if (!verifyWitness(session.id, witness)) {
      return yield* Effect.fail(
        new InvalidWitness({
          message: `Signature of ${signer} does not verify`,
          cause: `Signed message is not ${session.id}`,
          signer,
        }),
      );
    }
    return {
      ...session,
      witnesses: { ...session.witnesses, [signer]: witness },
    };
  });

const addWitnesses = (
  session: SigningSession,
  witnesses: readonly VKeyWitness[],
): Effect.Effect<SigningSession, UnexpectedSigner | InvalidWitness> =>
  Effect.reduce(witnesses, session, (acc, w) =>
    addWitness(acc, witnessKeyHash(w), w),
  );

export const makeSignatureCoordinator = (
  store: SessionStore,
): SignatureCoordinator => {
  const session = (id: SessionId) =>
    Effect.gen(function* () {
      const found = yield* store.load(id);
      if (found === null) {
        return yield* Effect.fail(
          new SessionNotFound({
            message: `Failed to find signing session ${id}`,
            cause: "No session with this transaction hash was started",
            sessionId: id,
          }),
        );
      }
      return found;
    });

  const openOrResume = (
    body: TransactionBody,
    request: ActionRequest | null,
  ) =>
    Effect.gen(function* () {
      const id = transactionHash(body);
      const existing = yield* store.load(id);
      if (existing !== null) {
        return existing;
      }
      const fresh: SigningSession = { id, body, witnesses: {}, request };
      yield* Effect.logInfo(
        `Started signing session ${id} for ${body.requiredSigners.length} signer(s)`,
      );
      return fresh;
    });

  const start = (
    tx: Transaction,
    requiredSigners: readonly PubKeyHash[],
    request: ActionRequest | null = null,
  ) =>
    Effect.gen(function* () {
      const id = transactionHash(tx.body);
      yield* checkSignerSet(id, tx.body, requiredSigners);
      const opened = yield* openOrResume(tx.body, request);
      const updated = yield* addWitnesses(opened, tx.witnesses);
      yield* store.save(updated);
      return id;
    });

  const contribute = (id: SessionId, signer: PubKeyHash, witness: VKeyWitness) =>
    Effect.gen(function* () {
      const current = yield* session(id);
      const updated = yield* addWitness(current, signer, witness);
      if (updated !== current) {
        yield* store.save(updated);
        yield* Effect.logInfo(`Recorded signature of ${signer} on ${id}`);
      }
      return sessionStatus(updated);
    });

  const status = (id: SessionId) => Effect.map(session(id), sessionStatus);

  const exportEnvelope = (id: SessionId) =>
    Effect.map(session(id), (s) =>
      encodeEnvelope({
        body: s.body,
        witnesses: Object.keys(s.witnesses)
          .sort()
          .map((pkh) => s.witnesses[pkh]),
        request: s.request,
      }),
    );

  const importEnvelope = (bytes: Uint8Array) =>
    Effect.gen(function* () {
      const envelope = yield* decodeEnvelope(bytes);
      const opened = yield* openOrResume(envelope.body, envelope.request);
      const updated = yield* addWitnesses(opened, envelope.witnesses);
      yield* store.save(updated);
      const added = Object.keys(updated.witnesses).length -
        Object.keys(opened.witnesses).length;
      yield* Effect.logInfo(
        `Imported envelope for ${updated.id} with ${added} new signature(s)`,
      );
      return updated.id;
    });

  return { start, contribute, status, session, exportEnvelope, importEnvelope };
};

/**
 * Fails with `StaleTransaction` when any input of `body` is no longer
 * unspent, which means another transaction consumed the state first.
 */
export const checkFreshness = (
  query: ChainQuery,
  body: TransactionBody,
): Effect.Effect<void, StaleTransaction | ProviderError> =>
  Effect.gen(function* () {
    const found = yield* query.resolveOutRefs(body.inputs);
    const consumed: OutRef[] = body.inputs.filter(
      (ref) => !containsOutRef(found, ref),
    );
    if (consumed.length > 0) {
      const txHash = transactionHash(body);
      return yield* Effect.fail(
        new StaleTransaction({
          message: `Transaction ${txHash} spends outputs that are gone`,
          cause: `Consumed: ${consumed.map(outRefKey).join(", ")}`,
          txHash,
          consumed,
        }),
      );
    }
  });

import * as FS from "node:fs";
import * as Path from "node:path";
import { Context, Effect, Layer, Ref } from "effect";
import type { ActionRequest } from "./action-request.js";
import type { PubKeyHash } from "./common.js";
import { decodeEnvelope, encodeEnvelope } from "./envelope.js";
import { SessionStoreError } from "./errors.js";
import { witnessKeyHash } from "./transaction.js";
import type { TransactionBody, VKeyWitness } from "./transaction.js";

/**
 * A transaction waiting for signatures. Its id is the transaction hash.
 */
export type SigningSession = {
  readonly id: string;
  readonly body: TransactionBody;
  readonly witnesses: Readonly<Record<PubKeyHash, VKeyWitness>>;
  readonly request: ActionRequest | null;
};

export type SessionStore = {
  readonly load: (
    id: string,
  ) => Effect.Effect<SigningSession | null, SessionStoreError>;
  readonly save: (session: SigningSession) => Effect.Effect<void, SessionStoreError>;
  readonly list: () => Effect.Effect<readonly string[], SessionStoreError>;
};

export const makeMemorySessionStore: Effect.Effect<SessionStore> = Effect.gen(
  function* () {
    const sessions = yield* Ref.make<ReadonlyMap<string, SigningSession>>(
      new Map(),
    );
    return {
      load: (id) =>
        Ref.get(sessions).pipe(Effect.map((m) => m.get(id) ?? null)),
      save: (session) =>
        Ref.update(sessions, (m) => new Map(m).set(session.id, session)),
      list: () => Ref.get(sessions).pipe(Effect.map((m) => [...m.keys()].sort())),
    };
  },
);

const SESSION_FILE_EXTENSION = ".envelope";
const SESSION_ID_PATTERN = /^[0-9a-f]{64}$/;

const sessionPath = (dir: string, id: string): string =>
  Path.join(dir, `${id}${SESSION_FILE_EXTENSION}`);

const checkSessionId = (id: string): Effect.Effect<void, SessionStoreError> =>
  SESSION_ID_PATTERN.test(id)
    ? Effect.void
    : Effect.fail(
        new SessionStoreError({
          message: `Invalid session id ${id}`,
          cause: "Session ids are lowercase transaction hashes",
        }),
      );

/**
 * One envelope blob per session, named after the transaction hash.
 */
export const makeFileSessionStore = (
  dir: string,
): Effect.Effect<SessionStore, SessionStoreError> =>
  Effect.gen(function* () {
    yield* Effect.try({
      try: () => FS.mkdirSync(dir, { recursive: true }),
      catch: (e) =>
        new SessionStoreError({
          message: `Failed to create session directory ${dir}`,
          cause: e,
        }),
    });

    const load = (id: string) =>
      Effect.gen(function* () {
        yield* checkSessionId(id);
        const path = sessionPath(dir, id);
        if (!FS.existsSync(path)) {
          return null;
        }
        const bytes = yield* Effect.try({
          try: () => new Uint8Array(FS.readFileSync(path)),
          catch: (e) =>
            new SessionStoreError({
              message: `Failed to read session ${id}`,
              cause: e,
            }),
        });
        const envelope = yield* decodeEnvelope(bytes).pipe(
          Effect.mapError(
            (e) =>
              new SessionStoreError({
                message: `Session file ${path} is corrupt`,
                cause: e,
              }),
          ),
        );
        const witnesses: Record<PubKeyHash, VKeyWitness> = {};
        for (const w of envelope.witnesses) {
          witnesses[witnessKeyHash(w)] = w;
        }
        const session: SigningSession = {
          id,
          body: envelope.body,
          witnesses,
          request: envelope.request,
        };
        return session;
      });

    const save = (session: SigningSession) =>
      Effect.gen(function* () {
        yield* checkSessionId(session.id);
        const bytes = encodeEnvelope({
          body: session.body,
          witnesses: Object.keys(session.witnesses)
            .sort()
            .map((pkh) => session.witnesses[pkh]),
          request: session.request,
        });
        const path = sessionPath(dir, session.id);
        const tmp = `${path}.tmp`;
        yield* Effect.try({
          try: () => {
            FS.writeFileSync(tmp, bytes);
            FS.renameSync(tmp, path);
          },
          catch: (e) =>
            new SessionStoreError({
              message: `Failed to write session ${session.id}`,
              cause: e,
            }),
        });
      });

    const list = () =>
      Effect.try({
        try: () =>
          FS.readdirSync(dir)
            .filter((name) => name.endsWith(SESSION_FILE_EXTENSION))
            .map((name) => name.slice(0, -SESSION_FILE_EXTENSION.length))
            .sort(),
        catch: (e) =>
          new SessionStoreError({
            message: `Failed to list sessions in ${dir}`,
            cause: e,
          }),
      });

    return { load, save, list };
  });

export class SessionStoreService extends Context.Tag("SessionStore")<
  SessionStoreService,
  SessionStore
>() {
  static readonly memory = Layer.effect(
    SessionStoreService,
    makeMemorySessionStore,
  );

  static readonly file = (dir: string) =>
    Layer.effect(SessionStoreService, makeFileSessionStore(dir));
}

import { fromHex, toHex } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import { decodeActionRequest, encodeActionRequest } from "./action-request.js";
import type { ActionRequest } from "./action-request.js";
import {
  asArray,
  asBytes,
  asNullable,
  asSafeNumber,
  asTuple,
  decodeSingleCbor,
  encodeCbor,
} from "./cbor.js";
import { ENVELOPE_VERSION } from "./constants.js";
import { CborDeserializationError, SchemaMismatch } from "./errors.js";
import { decodeTransaction, encodeTransaction } from "./transaction.js";
import type { TransactionBody, VKeyWitness } from "./transaction.js";

/**
 * What cosigners exchange: the unsigned transaction, the witnesses collected
 * so far and, optionally, the request it was built from.
 *
 * Wire form: `[version, txBytes, [[vkey, signature], ...], requestBytes | null]`.
 */
export type SignatureEnvelope = {
  readonly body: TransactionBody;
  readonly witnesses: readonly VKeyWitness[];
  readonly request: ActionRequest | null;
};

export const encodeEnvelope = (envelope: SignatureEnvelope): Uint8Array =>
  encodeCbor([
    ENVELOPE_VERSION,
    encodeTransaction({ body: envelope.body, witnesses: [] }),
    envelope.witnesses.map((w) => [fromHex(w.vkey), fromHex(w.signature)]),
    envelope.request === null
      ? null
      : fromHex(encodeActionRequest(envelope.request)),
  ]);

type RawEnvelope = {
  readonly txBytes: Uint8Array;
  readonly witnesses: VKeyWitness[];
  readonly requestBytes: Uint8Array | null;
};

const readEnvelope = (bytes: Uint8Array): RawEnvelope => {
  const [version, txBytes, witnesses, requestBytes] = asTuple(
    decodeSingleCbor(bytes),
    4,
    "envelope",
  );
  const v = asSafeNumber(version, "envelope.version");
  if (v !== ENVELOPE_VERSION) {
    throw new CborDeserializationError({
      message: `Unsupported envelope version ${v}`,
      cause: `expected ${ENVELOPE_VERSION}`,
    });
  }
  return {
    txBytes: asBytes(txBytes, "envelope.tx"),
    witnesses: asArray(witnesses, "envelope.witnesses").map((w, i) => {
      const [vkey, signature] = asTuple(w, 2, `envelope.witnesses[${i}]`);
      return {
        vkey: toHex(asBytes(vkey, `envelope.witnesses[${i}].vkey`)),
        signature: toHex(
          asBytes(signature, `envelope.witnesses[${i}].signature`),
        ),
      };
    }),
    requestBytes: asNullable(requestBytes, (v) => asBytes(v, "envelope.request")),
  };
};

export const decodeEnvelope = (
  bytes: Uint8Array,
): Effect.Effect<SignatureEnvelope, CborDeserializationError | SchemaMismatch> =>
  Effect.gen(function* () {
    const raw = yield* Effect.try({
      try: () => readEnvelope(bytes),
      catch: (e) =>
        e instanceof CborDeserializationError
          ? e
          : new CborDeserializationError({
              message: "Failed to decode signature envelope",
              cause: e,
            }),
    });
    const tx = yield* decodeTransaction(raw.txBytes);
    if (tx.witnesses.length > 0) {
      return yield* Effect.fail(
        new CborDeserializationError({
          message: "Envelope transaction must be unsigned",
          cause: `${tx.witnesses.length} embedded witness(es)`,
        }),
      );
    }
    const request =
      raw.requestBytes === null
        ? null
        : yield* decodeActionRequest(toHex(raw.requestBytes));
    return { body: tx.body, witnesses: raw.witnesses, request };
  });

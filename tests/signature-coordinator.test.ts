import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { Effect } from "effect";
import { encodeCbor } from "@/cbor.js";
import { decodeEnvelope, encodeEnvelope } from "@/envelope.js";
import { makeMemorySessionStore } from "@/session-store.js";
import { makeSignatureCoordinator } from "@/signature-coordinator.js";
import { unsatisfiedSigners } from "@/submission-gate.js";
import {
  encodeTransaction,
  makeWitness,
  transactionHash,
} from "@/transaction.js";
import type { TransactionBody } from "@/transaction.js";
import { makeActor } from "./utils.js";

const [first, second] = [makeActor(), makeActor()].sort((a, b) =>
  a.pubKeyHash < b.pubKeyHash ? -1 : 1,
);
const outsider = makeActor();

const body: TransactionBody = {
  inputs: [{ txHash: "22".repeat(32), outputIndex: 0 }],
  referenceInputs: [],
  collateral: [],
  outputs: [
    {
      address: first.address,
      assets: { lovelace: 5_000_000n },
      datum: null,
      scriptRef: null,
    },
  ],
  fee: 180_000n,
  mint: {},
  redeemers: [],
  requiredSigners: [first.pubKeyHash, second.pubKeyHash],
  validFrom: null,
  validTo: null,
  scripts: [],
  scriptDataHash: null,
};
const txHash = transactionHash(body);
const signers = body.requiredSigners;

const makeCoordinator = Effect.map(makeMemorySessionStore, makeSignatureCoordinator);

describe("signature coordinator", () => {
  it.effect("collects every required signature before completing", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const id = yield* coordinator.start({ body, witnesses: [] }, signers);
      expect(id).toBe(txHash);
      expect(yield* coordinator.status(id)).toEqual({
        _tag: "Pending",
        missing: [first.pubKeyHash, second.pubKeyHash],
      });

      const firstWitness = makeWitness(id, first.key);
      const afterFirst = yield* coordinator.contribute(
        id,
        first.pubKeyHash,
        firstWitness,
      );
      expect(afterFirst).toEqual({ _tag: "Pending", missing: [second.pubKeyHash] });

      const secondWitness = makeWitness(id, second.key);
      const done = yield* coordinator.contribute(
        id,
        second.pubKeyHash,
        secondWitness,
      );
      expect(done._tag).toBe("Complete");
      if (done._tag === "Complete") {
        expect(done.signedTx.body).toEqual(body);
        expect(done.signedTx.witnesses).toEqual([firstWitness, secondWitness]);
      }
    }),
  );

  it.effect("completes whatever order the signatures arrive in", () =>
    Effect.gen(function* () {
      const quorum = Array.from({ length: 4 }, makeActor).sort((a, b) =>
        a.pubKeyHash < b.pubKeyHash ? -1 : 1,
      );
      const multisig: TransactionBody = {
        ...body,
        requiredSigners: quorum.map((a) => a.pubKeyHash),
      };
      const orders = [
        [3, 2, 1, 0],
        [2, 0, 3, 1],
      ];
      for (const order of orders) {
        const coordinator = yield* makeCoordinator;
        const id = yield* coordinator.start(
          { body: multisig, witnesses: [] },
          multisig.requiredSigners,
        );
        for (const [step, index] of order.entries()) {
          const signer = quorum[index];
          const status = yield* coordinator.contribute(
            id,
            signer.pubKeyHash,
            makeWitness(id, signer.key),
          );
          expect(status._tag).toBe(
            step === order.length - 1 ? "Complete" : "Pending",
          );
        }
        const status = yield* coordinator.status(id);
        expect(status._tag).toBe("Complete");
        if (status._tag === "Complete") {
          expect(status.signedTx.witnesses).toEqual(
            quorum.map((a) => makeWitness(id, a.key)),
          );
          expect(unsatisfiedSigners(status.signedTx)).toEqual([]);
        }
      }
    }),
  );

  it.effect("ignores a repeated contribution", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const id = yield* coordinator.start({ body, witnesses: [] }, signers);
      const witness = makeWitness(id, first.key);
      const once = yield* coordinator.contribute(id, first.pubKeyHash, witness);
      const twice = yield* coordinator.contribute(id, first.pubKeyHash, witness);
      expect(twice).toEqual(once);
      const session = yield* coordinator.session(id);
      expect(Object.keys(session.witnesses)).toEqual([first.pubKeyHash]);
    }),
  );

  it.effect("resumes a session started twice", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const witness = makeWitness(txHash, first.key);
      yield* coordinator.start({ body, witnesses: [witness] }, signers);
      const id = yield* coordinator.start({ body, witnesses: [] }, signers);
      expect(yield* coordinator.status(id)).toEqual({
        _tag: "Pending",
        missing: [second.pubKeyHash],
      });
    }),
  );

  it.effect("refuses signers outside the required set", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const id = yield* coordinator.start({ body, witnesses: [] }, signers);
      const error = yield* Effect.flip(
        coordinator.contribute(
          id,
          outsider.pubKeyHash,
          makeWitness(id, outsider.key),
        ),
      );
      expect(error._tag).toBe("UnexpectedSigner");
      expect(error.message).toBe(
        `${outsider.pubKeyHash} is not a required signer of ${id}`,
      );
    }),
  );

  it.effect("refuses a start whose signer set differs from the body", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const error = yield* Effect.flip(
        coordinator.start({ body, witnesses: [] }, [first.pubKeyHash]),
      );
      expect(error._tag).toBe("UnexpectedSigner");
      expect(error.message).toBe(
        `Required signer ${second.pubKeyHash} of ${txHash} was not listed`,
      );
    }),
  );

  it.effect("refuses witnesses made with another key or over another hash", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const id = yield* coordinator.start({ body, witnesses: [] }, signers);
      const wrongKey = yield* Effect.flip(
        coordinator.contribute(id, first.pubKeyHash, makeWitness(id, second.key)),
      );
      const wrongHash = yield* Effect.flip(
        coordinator.contribute(
          id,
          first.pubKeyHash,
          makeWitness("ab".repeat(32), first.key),
        ),
      );
      expect(wrongKey._tag).toBe("InvalidWitness");
      expect(wrongKey.message).toBe(
        `Witness for ${first.pubKeyHash} was made with another key`,
      );
      expect(wrongHash._tag).toBe("InvalidWitness");
      expect(wrongHash.message).toBe(
        `Signature of ${first.pubKeyHash} does not verify`,
      );
      expect(yield* coordinator.status(id)).toEqual({
        _tag: "Pending",
        missing: [first.pubKeyHash, second.pubKeyHash],
      });
    }),
  );

  it.effect("fails for an unknown session", () =>
    Effect.gen(function* () {
      const coordinator = yield* makeCoordinator;
      const error = yield* Effect.flip(coordinator.status("cd".repeat(32)));
      expect(error._tag).toBe("SessionNotFound");
    }),
  );

  it.effect("merges envelopes exchanged between cosigners", () =>
    Effect.gen(function* () {
      const builder = yield* makeCoordinator;
      const cosigner = yield* makeCoordinator;
      const id = yield* builder.start({ body, witnesses: [] }, signers, {
        kind: "Aggregate",
      });
      yield* builder.contribute(id, first.pubKeyHash, makeWitness(id, first.key));

      const outbound = yield* builder.exportEnvelope(id);
      expect(yield* cosigner.importEnvelope(outbound)).toBe(id);
      expect(yield* cosigner.importEnvelope(outbound)).toBe(id);
      expect((yield* cosigner.session(id)).request).toEqual({ kind: "Aggregate" });
      yield* cosigner.contribute(
        id,
        second.pubKeyHash,
        makeWitness(id, second.key),
      );

      yield* builder.importEnvelope(yield* cosigner.exportEnvelope(id));
      expect((yield* builder.status(id))._tag).toBe("Complete");
    }),
  );
});

describe("signature envelope", () => {
  it.effect("carries witnesses and the originating request", () =>
    Effect.gen(function* () {
      const witness = makeWitness(txHash, first.key);
      const envelope = {
        body,
        witnesses: [witness],
        request: { kind: "NodeUpdate", price: 12n } as const,
      };
      expect(yield* decodeEnvelope(encodeEnvelope(envelope))).toEqual(envelope);
    }),
  );

  it.effect("rejects other envelope versions", () =>
    Effect.gen(function* () {
      const bytes = encodeCbor([
        2,
        encodeTransaction({ body, witnesses: [] }),
        [],
        null,
      ]);
      const error = yield* Effect.flip(decodeEnvelope(bytes));
      expect(error._tag).toBe("CborDeserializationError");
      expect(error.message).toBe("Unsupported envelope version 2");
    }),
  );

  it.effect("rejects a signed transaction inside the envelope", () =>
    Effect.gen(function* () {
      const bytes = encodeCbor([
        1,
        encodeTransaction({
          body,
          witnesses: [makeWitness(txHash, first.key)],
        }),
        [],
        null,
      ]);
      const error = yield* Effect.flip(decodeEnvelope(bytes));
      expect(error.message).toBe("Envelope transaction must be unsigned");
    }),
  );
});

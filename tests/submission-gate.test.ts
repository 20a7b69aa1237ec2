import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { Effect } from "effect";
import { makeMemorySessionStore } from "@/session-store.js";
import { makeSignatureCoordinator } from "@/signature-coordinator.js";
import { makeProviderSubmitter } from "@/services/submitter.js";
import { makeSubmissionGate } from "@/submission-gate.js";
import { buildAs, makeHarness, signAll } from "./utils.js";

const nodeUpdate = { kind: "NodeUpdate", price: 100n } as const;

describe("submission gate", () => {
  it.live("retries network failures", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.nodes[0], nodeUpdate);
      h.ledger.failNextSubmissions(2);
      const txHash = yield* h.gate.submit(signAll(h, result));
      expect(txHash).toBe(result.txHash);
      expect(h.ledger.submitCalls()).toBe(3);
    }),
  );

  it.live("gives up once the retries are spent", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.nodes[0], nodeUpdate);
      h.ledger.failNextSubmissions(10);
      const error = yield* Effect.flip(h.gate.submit(signAll(h, result)));
      expect(error._tag).toBe("SubmissionNetworkError");
      expect(error.message).toBe(
        "Failed to reach the submit endpoint: Error: connect ECONNREFUSED",
      );
      expect(h.ledger.submitCalls()).toBe(4);
    }),
  );

  it.live("does not retry a ledger rejection", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.nodes[0], nodeUpdate);
      const signed = signAll(h, result);
      yield* h.gate.submit(signed);
      const error = yield* Effect.flip(h.gate.submit(signed));
      expect(error._tag).toBe("SubmissionRejected");
      expect(error.cause).toBe("BadInputsUTxO");
      expect(h.ledger.submitCalls()).toBe(2);
    }),
  );

  it.live("refuses transactions with missing signatures", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.owners[0], {
        kind: "AddNodes",
        nodes: ["ab".repeat(28)],
      });
      const signed = signAll(h, result);
      const error = yield* Effect.flip(
        h.gate.submit({ ...signed, witnesses: signed.witnesses.slice(0, 1) }),
      );
      expect(error._tag).toBe("IncompleteSignatures");
      if (error._tag === "IncompleteSignatures") {
        expect(error.missing).toEqual(result.requiredSigners.slice(1));
      }
      expect(h.ledger.submitCalls()).toBe(0);
    }),
  );

  it.live("submits a session only once it is complete", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.nodes[0], nodeUpdate);
      const coordinator = makeSignatureCoordinator(yield* makeMemorySessionStore);
      const id = yield* coordinator.start(result.tx, result.requiredSigners);

      const pending = yield* Effect.flip(
        h.gate.submitSession(coordinator, h.query, id),
      );
      expect(pending._tag).toBe("IncompleteSignatures");
      expect(pending.message).toBe(`Signing session ${id} is not complete`);

      const [witness] = signAll(h, result).witnesses;
      yield* coordinator.contribute(id, h.nodes[0].pubKeyHash, witness);
      expect(yield* h.gate.submitSession(coordinator, h.query, id)).toBe(id);
    }),
  );

  it.live("waits for confirmation", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.nodes[0], nodeUpdate);
      const txHash = yield* h.gate.submit(signAll(h, result));
      yield* h.gate.awaitConfirmation(txHash);

      const unknown = "ef".repeat(32);
      const error = yield* Effect.flip(h.gate.awaitConfirmation(unknown));
      expect(error.message).toBe(`Transaction ${unknown} was not confirmed`);
    }),
  );

  it.live("cannot confirm without a confirmation source", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const gate = makeSubmissionGate({ submit: h.ledger.submitter.submit });
      const error = yield* Effect.flip(gate.awaitConfirmation("ef".repeat(32)));
      expect(error._tag).toBe("ConfirmationError");
      expect(error.cause).toBe("The submitter cannot observe confirmations");
    }),
  );
});

const failingProvider = (error: unknown) => {
  let calls = 0;
  return {
    provider: {
      submitTx: async (): Promise<string> => {
        calls += 1;
        throw error;
      },
      awaitTx: async () => true,
    },
    calls: () => calls,
  };
};

const submitThrough = (error: unknown) =>
  Effect.gen(function* () {
    const h = makeHarness();
    const result = yield* buildAs(h, h.nodes[0], nodeUpdate);
    const stub = failingProvider(error);
    const gate = makeSubmissionGate(makeProviderSubmitter(stub.provider), {
      retryAttempts: 3,
      initialRetryMs: 1,
      confirmationTimeoutMs: 1_000,
      confirmationPollMs: 1,
    });
    const failure = yield* Effect.flip(gate.submit(signAll(h, result)));
    return { failure, calls: stub.calls() };
  });

describe("provider submitter", () => {
  const badInputs =
    "transaction submit error ShelleyTxValidationError (BadInputsUTxO)";

  it.live("treats a Blockfrost 4xx body as a ledger rejection", () =>
    Effect.gen(function* () {
      const { failure, calls } = yield* submitThrough({
        status_code: 400,
        error: "Bad Request",
        message: badInputs,
      });
      expect(failure._tag).toBe("SubmissionRejected");
      expect(failure.cause).toBe(badInputs);
      expect(calls).toBe(1);
    }),
  );

  it.live("reads the status out of an error message holding JSON", () =>
    Effect.gen(function* () {
      const { failure, calls } = yield* submitThrough(
        new Error(JSON.stringify({ status_code: 400, message: badInputs })),
      );
      expect(failure._tag).toBe("SubmissionRejected");
      expect(calls).toBe(1);
    }),
  );

  it.live("treats an Ogmios submit failure as a ledger rejection", () =>
    Effect.gen(function* () {
      const message = "Some transaction inputs are unknown.";
      const { failure, calls } = yield* submitThrough(
        new Error(JSON.stringify({ code: 3117, message })),
      );
      expect(failure._tag).toBe("SubmissionRejected");
      expect(failure.cause).toBe(message);
      expect(calls).toBe(1);
    }),
  );

  it.live("retries transport failures and server errors", () =>
    Effect.gen(function* () {
      const down = yield* submitThrough(new Error("fetch failed"));
      expect(down.failure._tag).toBe("SubmissionNetworkError");
      expect(down.calls).toBe(4);

      const unavailable = yield* submitThrough({
        status_code: 503,
        message: "Service Unavailable",
      });
      expect(unavailable.failure._tag).toBe("SubmissionNetworkError");
      expect(unavailable.calls).toBe(4);
    }),
  );
});

import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { Effect } from "effect";
import { validateForCosigning } from "@/tx-validation.js";
import { buildAs, makeHarness, signAll } from "./utils.js";

describe("validateForCosigning", () => {
  it.effect("accepts an owner transaction built by another owner", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const before = yield* h.query.resolveState();
      const result = yield* buildAs(h, h.owners[0], {
        kind: "EditSettings",
        settings: { ...before.model.settings, aggregateChange: 250n },
      });
      const cosigner = h.owners[1];
      const report = yield* validateForCosigning(h.query, result.tx.body, {
        signer: cosigner.pubKeyHash,
        ownAddresses: [cosigner.address],
        allowOwnInputs: false,
        expectedTxHash: result.txHash,
      });
      expect(report.txHash).toBe(result.txHash);
      expect(report.oracleInputs).toHaveLength(1);
      expect(report.ownInputs).toEqual([]);
      expect(report.foreignSigners).toEqual([]);
      expect(report.balanced).toBe(true);
    }),
  );

  it.effect("flags the builder's own wallet inputs", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const builder = h.owners[0];
      const before = yield* h.query.resolveState();
      const edit = yield* buildAs(h, builder, {
        kind: "EditSettings",
        settings: { ...before.model.settings, aggregateChange: 250n },
      });
      const error = yield* Effect.flip(
        validateForCosigning(h.query, edit.tx.body, {
          signer: builder.pubKeyHash,
          ownAddresses: [builder.address],
          allowOwnInputs: false,
        }),
      );
      expect(error._tag).toBe("TxValidationError");
      expect(error.message).toBe(`Refusing to sign ${edit.txHash}`);
      expect(error.cause).toBe(
        "Transaction contains own wallet inputs; Transaction contains own wallet collateral inputs",
      );
    }),
  );

  it.effect("flags signers outside the platform and an unexpected hash", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const result = yield* buildAs(h, h.nodes[0], {
        kind: "NodeUpdate",
        price: 77n,
      });
      const owner = h.owners[0];
      const expected = "12".repeat(32);
      const error = yield* Effect.flip(
        validateForCosigning(h.query, result.tx.body, {
          signer: owner.pubKeyHash,
          ownAddresses: [owner.address],
          allowOwnInputs: false,
          expectedTxHash: expected,
        }),
      );
      expect(error.cause).toBe(
        [
          "Transaction does not require a signature from this wallet",
          `Transaction requires signatures outside of the oracle platform: ${h.nodes[0].pubKeyHash}`,
          `Transaction hash ${result.txHash} differs from the expected ${expected}`,
        ].join("; "),
      );
    }),
  );

  it.effect("refuses a transaction whose inputs were spent", () =>
    Effect.gen(function* () {
      const h = makeHarness();
      const before = yield* h.query.resolveState();
      const result = yield* buildAs(h, h.owners[0], {
        kind: "EditSettings",
        settings: { ...before.model.settings, aggregateChange: 250n },
      });
      yield* h.gate.submit(signAll(h, result));
      const error = yield* Effect.flip(
        validateForCosigning(h.query, result.tx.body, {
          signer: h.owners[1].pubKeyHash,
          ownAddresses: [h.owners[1].address],
          allowOwnInputs: false,
        }),
      );
      expect(error._tag).toBe("StaleTransaction");
    }),
  );
});

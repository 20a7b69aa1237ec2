import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { Constr, Data } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import fc from "fast-check";
import {
  decodeActionRequest,
  encodeActionRequest,
  redeemerForAction,
  validateActionRequest,
} from "@/action-request.js";
import type { ActionRequest } from "@/action-request.js";
import { decodeOracleRedeemer, encodeOracleRedeemer } from "@/redeemers.js";
import { actionRequestArb } from "./arbitraries.js";
import { makeActor } from "./utils.js";

describe("oracle redeemers", () => {
  it.effect("use the validator's constructor order", () =>
    Effect.gen(function* () {
      expect(encodeOracleRedeemer("NodeUpdate")).toBe(Data.to(new Constr(0, [])));
      expect(encodeOracleRedeemer("Aggregate")).toBe(Data.to(new Constr(3, [])));
      expect(encodeOracleRedeemer("AddFunds")).toBe(Data.to(new Constr(8, [])));
      expect(yield* decodeOracleRedeemer(Data.to(new Constr(7, [])))).toBe(
        "OracleClose",
      );
    }),
  );

  it("maps actions to the redeemer spending their inputs", () => {
    expect(redeemerForAction("EditSettings")).toBe("UpdateSettings");
    expect(redeemerForAction("Close")).toBe("OracleClose");
    expect(redeemerForAction("NodeCollect")).toBe("NodeCollect");
    expect(redeemerForAction("CreateReferenceScript")).toBeNull();
  });
});

describe("action request encoding", () => {
  it.effect("keeps addresses and optional recipients", () =>
    Effect.gen(function* () {
      const recipient = makeActor().address;
      const close: ActionRequest = {
        kind: "Close",
        disbursement: "ToOneAddress",
        recipient,
      };
      const collect: ActionRequest = { kind: "NodeCollect", recipient: null };
      expect(yield* decodeActionRequest(encodeActionRequest(close))).toEqual(
        close,
      );
      expect(yield* decodeActionRequest(encodeActionRequest(collect))).toEqual(
        collect,
      );
    }),
  );

  it.effect("keeps node lists and flags", () =>
    Effect.gen(function* () {
      const request: ActionRequest = {
        kind: "RemoveNodes",
        nodes: ["a1".repeat(28), "b2".repeat(28)],
        payoutRewards: true,
      };
      expect(yield* decodeActionRequest(encodeActionRequest(request))).toEqual(
        request,
      );
    }),
  );

  it("reads back every request kind", () => {
    fc.assert(
      fc.property(actionRequestArb, (request) => {
        const decoded = Effect.runSync(
          decodeActionRequest(encodeActionRequest(request)),
        );
        expect(decoded).toEqual(request);
      }),
      { numRuns: 200 },
    );
  });

  it.effect("fails on foreign data", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        decodeActionRequest(Data.to(new Constr(42, []))),
      );
      expect(error._tag).toBe("SchemaMismatch");
    }),
  );
});

describe("validateActionRequest", () => {
  it.effect("accepts well-formed requests", () =>
    Effect.gen(function* () {
      const request: ActionRequest = { kind: "NodeUpdate", price: 1n };
      expect(yield* validateActionRequest(request)).toBe(request);
    }),
  );

  it.effect("rejects non-positive prices and amounts", () =>
    Effect.gen(function* () {
      const price = yield* Effect.flip(
        validateActionRequest({ kind: "NodeUpdate", price: 0n }),
      );
      const amount = yield* Effect.flip(
        validateActionRequest({ kind: "AddFunds", amount: -5n }),
      );
      expect(price.message).toBe("Malformed NodeUpdate request");
      expect(price.cause).toBe("price must be positive");
      expect(amount.cause).toBe("amount must be positive");
    }),
  );

  it.effect("lists every problem of a node list", () =>
    Effect.gen(function* () {
      const node = "a1".repeat(28);
      const error = yield* Effect.flip(
        validateActionRequest({ kind: "AddNodes", nodes: [node, node, "zz"] }),
      );
      expect(error._tag).toBe("IllegalTransition");
      expect(error.action).toBe("AddNodes");
      expect(error.cause).toBe("malformed key hashes: zz; duplicate nodes");
    }),
  );

  it.effect("rejects recipients that are not addresses", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        validateActionRequest({
          kind: "PlatformCollect",
          recipient: "not-an-address",
        }),
      );
      expect(error.cause).toBe("invalid recipient address not-an-address");
    }),
  );
});

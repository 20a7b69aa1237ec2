import { toHex } from "@lucid-evolution/lucid";
import fc from "fast-check";
import type { ActionRequest } from "@/action-request.js";
import type { PubKeyHash } from "@/common.js";
import type { OracleSettings, PriceData } from "@/datums.js";
import type { NodeEntry, OracleModel } from "@/oracle-state.js";
import { makeActor } from "./utils.js";

export const pubKeyHashArb: fc.Arbitrary<PubKeyHash> = fc
  .uint8Array({ minLength: 28, maxLength: 28 })
  .map(toHex);

export const naturalArb = fc.bigInt({ min: 0n, max: 2n ** 64n });

export const priceArb: fc.Arbitrary<PriceData> = fc.record({
  price: naturalArb,
  timestamp: naturalArb,
  expiry: naturalArb,
});

export const settingsArb: fc.Arbitrary<OracleSettings> = fc.record({
  nodeList: fc.uniqueArray(pubKeyHashArb, { maxLength: 6 }),
  updatedNodes: naturalArb,
  updatedNodeTime: naturalArb,
  aggregateTime: naturalArb,
  aggregateChange: naturalArb,
  minimumDeposit: naturalArb,
  nodeFeePrice: fc.record({
    nodeFee: naturalArb,
    aggregateFee: naturalArb,
    platformFee: naturalArb,
  }),
  iqrMultiplier: naturalArb,
  divergence: naturalArb,
  platform: fc.record({
    multisigPkhs: fc.uniqueArray(pubKeyHashArb, { minLength: 1, maxLength: 4 }),
    multisigThreshold: naturalArb,
  }),
});

const nodeFieldsArb = fc.record({
  feed: fc.option(fc.record({ value: naturalArb, lastUpdate: naturalArb }), {
    nil: null,
  }),
  reward: naturalArb,
});

/**
 * Models whose node entries follow the settings' node list.
 */
export const modelArb: fc.Arbitrary<OracleModel> = settingsArb.chain((settings) =>
  fc.record({
    price: fc.option(priceArb, { nil: null }),
    settings: fc.constant(settings),
    nodes: fc
      .array(nodeFieldsArb, {
        minLength: settings.nodeList.length,
        maxLength: settings.nodeList.length,
      })
      .map((fields) =>
        fields.map(
          (f, i): NodeEntry => ({ operator: settings.nodeList[i], ...f }),
        ),
      ),
    platformReward: naturalArb,
  }),
);

const addresses = Array.from({ length: 3 }, () => makeActor().address);
const addressArb = fc.constantFrom(...addresses);
const nodesArb = fc.uniqueArray(pubKeyHashArb, { minLength: 1, maxLength: 5 });

export const actionRequestArb: fc.Arbitrary<ActionRequest> = fc.oneof(
  fc.constant<ActionRequest>({ kind: "Aggregate" }),
  fc.constant<ActionRequest>({ kind: "CreateReferenceScript" }),
  naturalArb.map((price): ActionRequest => ({ kind: "NodeUpdate", price })),
  nodesArb.map((nodes): ActionRequest => ({ kind: "AddNodes", nodes })),
  fc
    .tuple(nodesArb, fc.boolean())
    .map(
      ([nodes, payoutRewards]): ActionRequest => ({
        kind: "RemoveNodes",
        nodes,
        payoutRewards,
      }),
    ),
  naturalArb.map((amount): ActionRequest => ({ kind: "AddFunds", amount })),
  settingsArb.map((settings): ActionRequest => ({ kind: "EditSettings", settings })),
  addressArb.map(
    (recipient): ActionRequest => ({ kind: "PlatformCollect", recipient }),
  ),
  fc
    .option(addressArb, { nil: null })
    .map((recipient): ActionRequest => ({ kind: "NodeCollect", recipient })),
  fc
    .tuple(fc.constantFrom("ToNodes" as const, "ToOneAddress" as const), addressArb)
    .map(
      ([disbursement, recipient]): ActionRequest => ({
        kind: "Close",
        disbursement,
        recipient,
      }),
    ),
);

import { Data, fromText, getAddressDetails, toText } from "@lucid-evolution/lucid";
import type { Address } from "@lucid-evolution/lucid";
import { Effect } from "effect";
import { isPubKeyHash, PubKeyHashSchema } from "./common.js";
import type { PubKeyHash } from "./common.js";
import { OracleSettingsSchema } from "./datums.js";
import type { OracleSettings } from "./datums.js";
import { IllegalTransition, SchemaMismatch } from "./errors.js";
import type { OracleRedeemer } from "./redeemers.js";

export type Disbursement = "ToNodes" | "ToOneAddress";

/**
 * A typed intent against the oracle. Requests carry only the semantic delta;
 * datums and redeemers are derived by the transaction builder.
 */
export type ActionRequest =
  | { readonly kind: "Aggregate" }
  | { readonly kind: "NodeUpdate"; readonly price: bigint }
  | { readonly kind: "AddNodes"; readonly nodes: readonly PubKeyHash[] }
  | {
      readonly kind: "RemoveNodes";
      readonly nodes: readonly PubKeyHash[];
      readonly payoutRewards: boolean;
    }
  | { readonly kind: "AddFunds"; readonly amount: bigint }
  | { readonly kind: "EditSettings"; readonly settings: OracleSettings }
  | { readonly kind: "PlatformCollect"; readonly recipient: Address }
  | { readonly kind: "NodeCollect"; readonly recipient: Address | null }
  | {
      readonly kind: "Close";
      readonly disbursement: Disbursement;
      readonly recipient: Address;
    }
  | { readonly kind: "CreateReferenceScript" };

export type ActionKind = ActionRequest["kind"];

/**
 * The validator redeemer used when spending oracle UTxOs for the given
 * action, or `null` when the action spends none.
 */
export const redeemerForAction = (kind: ActionKind): OracleRedeemer | null => {
  switch (kind) {
    case "Aggregate":
      return "Aggregate";
    case "NodeUpdate":
      return "NodeUpdate";
    case "AddNodes":
      return "AddNodes";
    case "RemoveNodes":
      return "RemoveNodes";
    case "AddFunds":
      return "AddFunds";
    case "EditSettings":
      return "UpdateSettings";
    case "PlatformCollect":
      return "PlatformCollect";
    case "NodeCollect":
      return "NodeCollect";
    case "Close":
      return "OracleClose";
    case "CreateReferenceScript":
      return null;
  }
};

// ============================================================================
// Binary form, carried inside signature envelopes so cosigners see the intent
// ============================================================================

export const ActionRequestSchema = Data.Enum([
  Data.Literal("Aggregate"),
  Data.Object({
    AddNodes: Data.Object({ nodes: Data.Array(PubKeyHashSchema) }),
  }),
  Data.Object({
    RemoveNodes: Data.Object({
      nodes: Data.Array(PubKeyHashSchema),
      payoutRewards: Data.Boolean(),
    }),
  }),
  Data.Object({ AddFunds: Data.Object({ amount: Data.Integer() }) }),
  Data.Object({
    EditSettings: Data.Object({ settings: OracleSettingsSchema }),
  }),
  Data.Object({ PlatformCollect: Data.Object({ recipient: Data.Bytes() }) }),
  Data.Object({
    NodeCollect: Data.Object({ recipient: Data.Nullable(Data.Bytes()) }),
  }),
  Data.Object({
    Close: Data.Object({
      disbursement: Data.Enum([
        Data.Literal("ToNodes"),
        Data.Literal("ToOneAddress"),
      ]),
      recipient: Data.Bytes(),
    }),
  }),
  Data.Literal("CreateReferenceScript"),
  Data.Object({ NodeUpdate: Data.Object({ price: Data.Integer() }) }),
]);
export type ActionRequestData = Data.Static<typeof ActionRequestSchema>;
export const ActionRequestData =
  ActionRequestSchema as unknown as ActionRequestData;

const toActionRequestData = (request: ActionRequest): ActionRequestData => {
  switch (request.kind) {
    case "Aggregate":
      return "Aggregate";
    case "CreateReferenceScript":
      return "CreateReferenceScript";
    case "NodeUpdate":
      return { NodeUpdate: { price: request.price } };
    case "AddNodes":
      return { AddNodes: { nodes: [...request.nodes] } };
    case "RemoveNodes":
      return {
        RemoveNodes: {
          nodes: [...request.nodes],
          payoutRewards: request.payoutRewards,
        },
      };
    case "AddFunds":
      return { AddFunds: { amount: request.amount } };
    case "EditSettings":
      return { EditSettings: { settings: request.settings } };
    case "PlatformCollect":
      return { PlatformCollect: { recipient: fromText(request.recipient) } };
    case "NodeCollect":
      return {
        NodeCollect: {
          recipient:
            request.recipient === null ? null : fromText(request.recipient),
        },
      };
    case "Close":
      return {
        Close: {
          disbursement: request.disbursement,
          recipient: fromText(request.recipient),
        },
      };
  }
};

const fromActionRequestData = (data: ActionRequestData): ActionRequest => {
  if (data === "Aggregate") return { kind: "Aggregate" };
  if (data === "CreateReferenceScript") return { kind: "CreateReferenceScript" };
  if ("NodeUpdate" in data) {
    return { kind: "NodeUpdate", price: data.NodeUpdate.price };
  }
  if ("AddNodes" in data) return { kind: "AddNodes", nodes: data.AddNodes.nodes };
  if ("RemoveNodes" in data) {
    return {
      kind: "RemoveNodes",
      nodes: data.RemoveNodes.nodes,
      payoutRewards: data.RemoveNodes.payoutRewards,
    };
  }
  if ("AddFunds" in data) return { kind: "AddFunds", amount: data.AddFunds.amount };
  if ("EditSettings" in data) {
    return { kind: "EditSettings", settings: data.EditSettings.settings };
  }
  if ("PlatformCollect" in data) {
    return {
      kind: "PlatformCollect",
      recipient: toText(data.PlatformCollect.recipient),
    };
  }
  if ("NodeCollect" in data) {
    const recipient = data.NodeCollect.recipient;
    return {
      kind: "NodeCollect",
      recipient: recipient === null ? null : toText(recipient),
    };
  }
  return {
    kind: "Close",
    disbursement: data.Close.disbursement,
    recipient: toText(data.Close.recipient),
  };
};

export const encodeActionRequest = (request: ActionRequest): string =>
  Data.to<ActionRequestData>(toActionRequestData(request), ActionRequestData);

export const decodeActionRequest = (
  cbor: string,
): Effect.Effect<ActionRequest, SchemaMismatch> =>
  Effect.try({
    try: () => fromActionRequestData(Data.from(cbor, ActionRequestData)),
    catch: (e) =>
      new SchemaMismatch({
        message: "Failed to decode the action request",
        cause: e,
      }),
  });

// ============================================================================
// Input validation
// ============================================================================

const isAddress = (address: string): boolean => {
  try {
    getAddressDetails(address);
    return true;
  } catch {
    return false;
  }
};

const requestProblems = (request: ActionRequest): string[] => {
  switch (request.kind) {
    case "Aggregate":
    case "CreateReferenceScript":
      return [];
    case "NodeUpdate":
      return request.price > 0n ? [] : ["price must be positive"];
    case "AddFunds":
      return request.amount > 0n ? [] : ["amount must be positive"];
    case "AddNodes":
    case "RemoveNodes": {
      const problems: string[] = [];
      if (request.nodes.length === 0) problems.push("no nodes given");
      const malformed = request.nodes.filter((pkh) => !isPubKeyHash(pkh));
      if (malformed.length > 0) {
        problems.push(`malformed key hashes: ${malformed.join(", ")}`);
      }
      if (new Set(request.nodes).size !== request.nodes.length) {
        problems.push("duplicate nodes");
      }
      return problems;
    }
    case "EditSettings":
      return [];
    case "PlatformCollect":
    case "Close":
      return isAddress(request.recipient)
        ? []
        : [`invalid recipient address ${request.recipient}`];
    case "NodeCollect":
      return request.recipient === null || isAddress(request.recipient)
        ? []
        : [`invalid recipient address ${request.recipient}`];
  }
};

/**
 * Structural validation of a request. Malformed requests are policy
 * violations and never reach the chain.
 */
export const validateActionRequest = (
  request: ActionRequest,
): Effect.Effect<ActionRequest, IllegalTransition> => {
  const problems = requestProblems(request);
  return problems.length === 0
    ? Effect.succeed(request)
    : Effect.fail(
        new IllegalTransition({
          message: `Malformed ${request.kind} request`,
          cause: problems.join("; "),
          action: request.kind,
        }),
      );
};

import * as FS from "node:fs";
import { Effect, Schema } from "effect";
import type { ActionKind, ActionRequest } from "../action-request.js";
import type { OracleSettings } from "../datums.js";
import { IllegalTransition } from "../errors.js";

/**
 * Raw command line flags of `build`.
 */
export type RequestFlags = {
  readonly price?: string;
  readonly amount?: string;
  readonly nodes?: readonly string[];
  readonly payoutRewards?: boolean;
  readonly settings?: string;
  readonly recipient?: string;
  readonly disbursement?: string;
};

export const ACTION_KINDS: readonly ActionKind[] = [
  "Aggregate",
  "NodeUpdate",
  "AddNodes",
  "RemoveNodes",
  "AddFunds",
  "EditSettings",
  "PlatformCollect",
  "NodeCollect",
  "Close",
  "CreateReferenceScript",
];

const isActionKind = (s: string): s is ActionKind =>
  ACTION_KINDS.some((kind) => kind === s);

const Integer = Schema.Union(Schema.BigInt, Schema.BigIntFromNumber);

const SettingsJson = Schema.Struct({
  nodeList: Schema.Array(Schema.String),
  updatedNodes: Integer,
  updatedNodeTime: Integer,
  aggregateTime: Integer,
  aggregateChange: Integer,
  minimumDeposit: Integer,
  nodeFeePrice: Schema.Struct({
    nodeFee: Integer,
    aggregateFee: Integer,
    platformFee: Integer,
  }),
  iqrMultiplier: Integer,
  divergence: Integer,
  platform: Schema.Struct({
    multisigPkhs: Schema.Array(Schema.String),
    multisigThreshold: Integer,
  }),
});

const malformed = (kind: string, cause: unknown) =>
  new IllegalTransition({
    message: `Malformed ${kind} request`,
    cause,
    action: kind,
  });

const required = (
  kind: ActionKind,
  flag: string,
  value: string | undefined,
): Effect.Effect<string, IllegalTransition> =>
  value === undefined
    ? Effect.fail(malformed(kind, `--${flag} is required`))
    : Effect.succeed(value);

const integerFlag = (
  kind: ActionKind,
  flag: string,
  value: string | undefined,
): Effect.Effect<bigint, IllegalTransition> =>
  Effect.flatMap(required(kind, flag, value), (s) =>
    Effect.try({
      try: () => BigInt(s),
      catch: () => malformed(kind, `--${flag} must be an integer, got ${s}`),
    }),
  );

/**
 * Oracle settings from a JSON file. Integers may be written as JSON numbers
 * or as decimal strings.
 */
export const readSettingsFile = (
  path: string,
): Effect.Effect<OracleSettings, IllegalTransition> =>
  Effect.gen(function* () {
    const json = yield* Effect.try({
      try: (): unknown => JSON.parse(FS.readFileSync(path, "utf8")),
      catch: (e) => malformed("EditSettings", e),
    });
    const s = yield* Schema.decodeUnknown(SettingsJson)(json).pipe(
      Effect.mapError((e) => malformed("EditSettings", e.message)),
    );
    return {
      ...s,
      nodeList: [...s.nodeList],
      nodeFeePrice: { ...s.nodeFeePrice },
      platform: {
        multisigPkhs: [...s.platform.multisigPkhs],
        multisigThreshold: s.platform.multisigThreshold,
      },
    };
  });

export const requestFromFlags = (
  action: string,
  flags: RequestFlags,
): Effect.Effect<ActionRequest, IllegalTransition> =>
  Effect.gen(function* () {
    if (!isActionKind(action)) {
      return yield* Effect.fail(
        malformed(action, `Unknown action, expected one of ${ACTION_KINDS.join(", ")}`),
      );
    }
    switch (action) {
      case "Aggregate":
      case "CreateReferenceScript":
        return { kind: action };
      case "NodeUpdate":
        return {
          kind: action,
          price: yield* integerFlag(action, "price", flags.price),
        };
      case "AddFunds":
        return {
          kind: action,
          amount: yield* integerFlag(action, "amount", flags.amount),
        };
      case "AddNodes":
        return { kind: action, nodes: flags.nodes ?? [] };
      case "RemoveNodes":
        return {
          kind: action,
          nodes: flags.nodes ?? [],
          payoutRewards: flags.payoutRewards ?? false,
        };
      case "EditSettings":
        return {
          kind: action,
          settings: yield* readSettingsFile(
            yield* required(action, "settings", flags.settings),
          ),
        };
      case "PlatformCollect":
        return {
          kind: action,
          recipient: yield* required(action, "recipient", flags.recipient),
        };
      case "NodeCollect":
        return { kind: action, recipient: flags.recipient ?? null };
      case "Close": {
        const disbursement = flags.disbursement ?? "ToNodes";
        if (disbursement !== "ToNodes" && disbursement !== "ToOneAddress") {
          return yield* Effect.fail(
            malformed(action, "--disbursement must be ToNodes or ToOneAddress"),
          );
        }
        return {
          kind: action,
          disbursement,
          recipient: yield* required(action, "recipient", flags.recipient),
        };
      }
    }
  });

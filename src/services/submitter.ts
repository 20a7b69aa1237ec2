import type { Provider } from "@lucid-evolution/lucid";
import { Effect, Option, Schema } from "effect";
import { OracleConfig } from "../config.js";
import { makeHttpSubmitter, makeSubmissionGate } from "../submission-gate.js";
import type { SubmitOutcome, Submitter } from "../submission-gate.js";
import { Chain } from "./chain.js";

const BlockfrostError = Schema.Struct({
  status_code: Schema.Number,
  error: Schema.optional(Schema.String),
  message: Schema.optional(Schema.String),
});

const OgmiosError = Schema.Struct({
  code: Schema.Number,
  message: Schema.String,
});

// Ogmios reports ledger validation failures of `submitTransaction` in the
// 3000 range of JSON-RPC error codes.
const isOgmiosSubmitFailure = (code: number) => code >= 3000 && code < 4000;

const candidates = (error: unknown): unknown[] => {
  const text =
    error instanceof Error
      ? error.message
      : typeof error === "string"
        ? error
        : null;
  if (text === null) {
    return [error];
  }
  return Option.match(Schema.decodeUnknownOption(Schema.parseJson())(text), {
    onNone: () => [error],
    onSome: (parsed) => [error, parsed],
  });
};

/**
 * Reads a ledger rejection out of an error thrown by a Lucid provider. `null`
 * means the error says nothing about the transaction and is treated as a
 * transport failure.
 */
export const rejectionReason = (error: unknown): string | null => {
  for (const candidate of candidates(error)) {
    const blockfrost = Schema.decodeUnknownOption(BlockfrostError)(candidate);
    if (
      Option.isSome(blockfrost) &&
      blockfrost.value.status_code >= 400 &&
      blockfrost.value.status_code < 500
    ) {
      return (
        blockfrost.value.message ??
        blockfrost.value.error ??
        `status ${blockfrost.value.status_code}`
      );
    }
    const ogmios = Schema.decodeUnknownOption(OgmiosError)(candidate);
    if (Option.isSome(ogmios) && isOgmiosSubmitFailure(ogmios.value.code)) {
      return ogmios.value.message;
    }
  }
  if (error instanceof Error && /transaction submit error/i.test(error.message)) {
    return error.message;
  }
  return null;
};

/**
 * Submits through the chain provider. Errors carrying a ledger verdict become
 * rejections, anything else is rethrown as a transport failure.
 */
export const makeProviderSubmitter = (
  provider: Pick<Provider, "submitTx" | "awaitTx">,
): Submitter => ({
  submit: async (cborHex): Promise<SubmitOutcome> => {
    try {
      return { _tag: "Accepted", txId: await provider.submitTx(cborHex) };
    } catch (e) {
      const reason = rejectionReason(e);
      if (reason === null) {
        throw e;
      }
      return { _tag: "Rejected", reason };
    }
  },
  awaitConfirmation: (txId, checkIntervalMs) =>
    provider.awaitTx(txId, checkIntervalMs),
});

const makeGate = Effect.gen(function* () {
  const config = yield* OracleConfig;
  const { provider } = yield* Chain;
  const viaProvider = makeProviderSubmitter(provider);
  const submitter: Submitter = Option.match(config.SUBMIT_API_URL, {
    onNone: () => viaProvider,
    onSome: (url) => ({
      ...makeHttpSubmitter(url),
      awaitConfirmation: viaProvider.awaitConfirmation,
    }),
  });
  return makeSubmissionGate(submitter);
});

export class Gate extends Effect.Service<Gate>()("Gate", {
  effect: makeGate,
  dependencies: [OracleConfig.layer, Chain.Default],
}) {}

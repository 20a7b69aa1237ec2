import { Data as EffectData } from "effect";
import type { Assets, OutRef } from "@lucid-evolution/lucid";

export type GenericErrorFields = {
  readonly message: string;
  readonly cause: unknown;
};

// Policy errors: raised before any chain interaction and never retried.

export class IllegalTransition extends EffectData.TaggedError(
  "IllegalTransition",
)<GenericErrorFields & { readonly action: string }> {}

// Resource errors.

export class InsufficientFunds extends EffectData.TaggedError(
  "InsufficientFunds",
)<GenericErrorFields & { readonly missing: Assets }> {}

export class StateNotFound extends EffectData.TaggedError(
  "StateNotFound",
)<GenericErrorFields> {}

export class AmbiguousState extends EffectData.TaggedError(
  "AmbiguousState",
)<GenericErrorFields & { readonly conflicting: readonly OutRef[] }> {}

// Schema errors: version skew between this engine and the deployed validator.

export class SchemaMismatch extends EffectData.TaggedError(
  "SchemaMismatch",
)<GenericErrorFields> {}

// Coordination errors.

export class UnexpectedSigner extends EffectData.TaggedError(
  "UnexpectedSigner",
)<GenericErrorFields & { readonly signer: string }> {}

export class InvalidWitness extends EffectData.TaggedError(
  "InvalidWitness",
)<GenericErrorFields & { readonly signer: string }> {}

export class SessionNotFound extends EffectData.TaggedError(
  "SessionNotFound",
)<GenericErrorFields & { readonly sessionId: string }> {}

export class StaleTransaction extends EffectData.TaggedError(
  "StaleTransaction",
)<
  GenericErrorFields & {
    readonly txHash: string;
    readonly consumed: readonly OutRef[];
  }
> {}

// Submission errors.

export class IncompleteSignatures extends EffectData.TaggedError(
  "IncompleteSignatures",
)<
  GenericErrorFields & {
    readonly txHash: string;
    readonly missing: readonly string[];
  }
> {}

export class SubmissionRejected extends EffectData.TaggedError(
  "SubmissionRejected",
)<GenericErrorFields & { readonly txHash: string; readonly reason: string }> {}

export class SubmissionNetworkError extends EffectData.TaggedError(
  "SubmissionNetworkError",
)<GenericErrorFields & { readonly txHash: string }> {}

export class ConfirmationError extends EffectData.TaggedError(
  "ConfirmationError",
)<GenericErrorFields & { readonly txHash: string }> {}

// Infrastructure.

export class ProviderError extends EffectData.TaggedError(
  "ProviderError",
)<GenericErrorFields> {}

export class FeeEstimationFailed extends EffectData.TaggedError(
  "FeeEstimationFailed",
)<GenericErrorFields & { readonly iterations: number }> {}

export class SessionStoreError extends EffectData.TaggedError(
  "SessionStoreError",
)<GenericErrorFields> {}

export class TxValidationError extends EffectData.TaggedError(
  "TxValidationError",
)<GenericErrorFields> {}

export class CborDeserializationError extends EffectData.TaggedError(
  "CborDeserializationError",
)<GenericErrorFields> {}

export class ConfigError extends EffectData.TaggedError("ConfigError")<
  GenericErrorFields & {
    readonly fieldsAndValues: readonly [string, string][];
  }
> {}

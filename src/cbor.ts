import { decodeFirst, encode, rfc8949EncodeOptions } from "cborg";
import { CborDeserializationError } from "./errors.js";

const DECODER_OPTIONS = {
  strict: true,
  allowIndefinite: false,
  allowUndefined: false,
  useMaps: true,
  rejectDuplicateMapKeys: true,
};

const fail = (message: string, cause: unknown = null): never => {
  throw new CborDeserializationError({ message, cause });
};

/**
 * Decodes exactly one CBOR item. Throws `CborDeserializationError`; callers
 * lift it into an effect at their boundary.
 */
export const decodeSingleCbor = (bytes: Uint8Array): unknown => {
  let decoded: [unknown, Uint8Array];
  try {
    decoded = decodeFirst(bytes, DECODER_OPTIONS);
  } catch (e) {
    return fail("Failed to decode CBOR", String(e));
  }
  const [value, remainder] = decoded;
  if (remainder.length !== 0) {
    return fail("Trailing bytes after CBOR value");
  }
  return value;
};

// Map keys are ordered by the RFC 8949 deterministic rules, so equal values
// always encode to equal bytes.
export const encodeCbor = (value: unknown): Uint8Array =>
  encode(value, rfc8949EncodeOptions);

export const asArray = (value: unknown, fieldName: string): unknown[] =>
  Array.isArray(value) ? value : fail(`${fieldName} must be a CBOR array`);

export const asTuple = (
  value: unknown,
  length: number,
  fieldName: string,
): unknown[] => {
  const items = asArray(value, fieldName);
  return items.length === length
    ? items
    : fail(`${fieldName} must have ${length} items`, `length=${items.length}`);
};

const asInteger = (value: unknown, fieldName: string): bigint => {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return BigInt(value);
  }
  return fail(`${fieldName} must be an integer`);
};

const asUnsigned = (value: unknown, fieldName: string): bigint => {
  const n = asInteger(value, fieldName);
  return n >= 0n ? n : fail(`${fieldName} must be an unsigned integer`);
};

export const asSafeNumber = (value: unknown, fieldName: string): number => {
  const n = asUnsigned(value, fieldName);
  return n <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(n)
    : fail(`${fieldName} is out of range`, `value=${n}`);
};

export const asBytes = (value: unknown, fieldName: string): Uint8Array =>
  value instanceof Uint8Array ? value : fail(`${fieldName} must be bytes`);

export const asNullable = <A>(
  value: unknown,
  read: (v: unknown) => A,
): A | null => (value === null ? null : read(value));

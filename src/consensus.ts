import { FACTOR_RESOLUTION } from "./constants.js";

export type Aggregation = {
  readonly median: bigint;
  readonly consensus: readonly bigint[];
  readonly lower: bigint;
  readonly upper: bigint;
};

const compareBigInts = (a: bigint, b: bigint): number =>
  a < b ? -1 : a > b ? 1 : 0;

export const sortFeeds = (feeds: readonly bigint[]): bigint[] =>
  [...feeds].sort(compareBigInts);

const abs = (x: bigint): bigint => (x < 0n ? -x : x);

// Medians are kept doubled so quartiles and bounds stay exact integers.
const doubledMedian = (sorted: readonly bigint[]): bigint => {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? 2n * sorted[mid]
    : sorted[mid - 1] + sorted[mid];
};

/**
 * Median of the feeds. For an even count this is the mean of the two middle
 * values, truncated.
 */
export const median = (feeds: readonly bigint[]): bigint =>
  doubledMedian(sortFeeds(feeds)) / 2n;

const doubledQuartiles = (
  sorted: readonly bigint[],
): { q1: bigint; q3: bigint } => {
  const n = sorted.length;
  const lowerHalf = sorted.slice(0, Math.floor(n / 2));
  const upperHalf = sorted.slice(Math.floor(n / 2) + (n % 2));
  return {
    q1: doubledMedian(lowerHalf.length > 0 ? lowerHalf : sorted),
    q3: doubledMedian(upperHalf.length > 0 ? upperHalf : sorted),
  };
};

/**
 * Interquartile-range consensus over node feeds. A feed is kept when it lies
 * within `[Q1 - k·IQR, Q3 + k·IQR]` and its distance to the median, in
 * ten-thousandths of the median, does not exceed `divergence`.
 *
 * Returns `null` for an empty feed list.
 */
export const aggregate = (
  feeds: readonly bigint[],
  iqrMultiplier: bigint,
  divergence: bigint,
): Aggregation | null => {
  if (feeds.length === 0) {
    return null;
  }
  const sorted = sortFeeds(feeds);
  const med = doubledMedian(sorted) / 2n;
  const { q1, q3 } = doubledQuartiles(sorted);
  const iqr = q3 - q1;
  const lowerBound = q1 - iqrMultiplier * iqr;
  const upperBound = q3 + iqrMultiplier * iqr;

  const withinDivergence = (x: bigint): boolean =>
    med === 0n
      ? x === 0n
      : (abs(x - med) * FACTOR_RESOLUTION) / med <= divergence;

  const consensus = sorted.filter(
    (x) => lowerBound <= 2n * x && 2n * x <= upperBound && withinDivergence(x),
  );
  if (consensus.length === 0) {
    return null;
  }
  return {
    median: med,
    consensus,
    lower: consensus[0],
    upper: consensus[consensus.length - 1],
  };
};

/**
 * timing.ts
 * Timing statistics for comparing direct submission against batched release; pure functions only.
 */

/** Population mean; 0 for an empty sample. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((a, b) => a + b, 0) / values.length
}

/**
 * variance
 * Population variance (divides by n, not n-1): the samples are the full observed population.
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0
  const m = mean(values)
  let s = 0
  for (const v of values) s += (v - m) * (v - m)
  return s / values.length
}

/**
 * timingCorrelationRatio
 * var(batched) / var(direct) over observation times. Values > 1 mean batching spread observations
 * away from the submission pattern. Returns 1 when the direct sample has no variance.
 */
export function timingCorrelationRatio(directTimes: readonly number[], batchedTimes: readonly number[]): number {
  const direct = variance(directTimes)
  if (direct <= 0) return 1
  return variance(batchedTimes) / direct
}

/**
 * meanObservationDelay
 * Average of (observed - submitted) for paired samples; the latency cost of batching.
 */
export function meanObservationDelay(submitted: readonly number[], observed: readonly number[]): number {
  const n = Math.min(submitted.length, observed.length)
  if (n === 0) return 0
  let s = 0
  for (let i = 0; i < n; i++) s += observed[i] - submitted[i]
  return s / n
}

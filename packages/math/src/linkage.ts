/**
 * linkage.ts
 * Adversary models for linking forwarded transactions back to their submissions; pure functions only.
 * A forwarding order is expressed as `order[k] = arrival index of the k-th forwarded item`.
 */

/**
 * spearmanRho
 * Rank correlation between two orderings of the same n distinct ranks:
 * rho = 1 - 6 * sum(d^2) / (n (n^2 - 1)). 1 = identical order, -1 = reversed, ~0 = unrelated.
 */
export function spearmanRho(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length)
  if (n < 2) return 1
  let d2 = 0
  for (let i = 0; i < n; i++) {
    const d = a[i] - b[i]
    d2 += d * d
  }
  return 1 - (6 * d2) / (n * (n * n - 1))
}

/**
 * fifoLinkageRate
 * Share of items an adversary links correctly by assuming release order equals arrival order.
 * Direct submission scores 1; a uniform shuffle scores 1/n in expectation.
 */
export function fifoLinkageRate(order: readonly number[]): number {
  if (order.length === 0) return 0
  let hits = 0
  for (let k = 0; k < order.length; k++) if (order[k] === k) hits++
  return hits / order.length
}

/**
 * predictedLinkageRate
 * Share of positions where an adversary's predicted order matches the actual forwarding order.
 */
export function predictedLinkageRate(actual: readonly number[], predicted: readonly number[]): number {
  const n = Math.min(actual.length, predicted.length)
  if (n === 0) return 0
  let hits = 0
  for (let k = 0; k < n; k++) if (actual[k] === predicted[k]) hits++
  return hits / n
}

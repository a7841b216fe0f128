/**
 * entropy.ts
 * Ordering entropy for shuffled batches; pure functions only.
 */

/**
 * shannonEntropy
 * H = -sum(p_i * log2 p_i) over the normalized counts. Zero counts contribute nothing.
 */
export function shannonEntropy(counts: readonly number[]): number {
  const total = counts.reduce((a, b) => a + Math.max(0, b), 0)
  if (total <= 0) return 0
  let h = 0
  for (const c of counts) {
    if (c <= 0) continue
    const p = c / total
    h -= p * Math.log2(p)
  }
  return h
}

export type PositionSample = { arrival: number; forward: number }

/**
 * positionEntropy
 * For each arrival index in [0, n), build the histogram of forwarding positions it was observed at
 * across many batches, and average the entropies. A uniform shuffle approaches log2(n);
 * an order-preserving release scores 0.
 */
export function positionEntropy(samples: readonly PositionSample[], n: number): number {
  if (n <= 0) return 0
  const histograms: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0))
  for (const s of samples) {
    if (s.arrival < 0 || s.arrival >= n || s.forward < 0 || s.forward >= n) continue
    histograms[s.arrival][s.forward] += 1
  }
  const observed = histograms.filter(h => h.some(c => c > 0))
  if (observed.length === 0) return 0
  return observed.reduce((acc, h) => acc + shannonEntropy(h), 0) / observed.length
}

/** Upper bound for positionEntropy with batches of size n. */
export function maxPositionEntropy(n: number): number {
  return n > 1 ? Math.log2(n) : 0
}

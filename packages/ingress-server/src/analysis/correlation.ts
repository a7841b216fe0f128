/**
 * correlation.ts
 *
 * Measures how much batching hides about submission timing and order. The same arrival stream is
 * observed twice: directly (each transaction seen at its own submission time, in arrival order) and
 * through a real BatchAccumulator driven by a simulated clock (every transaction in a batch seen at
 * the batch's seal time, in forwarding order).
 */
import crypto from 'crypto'
import { Batch, SeedPolicy } from '@mixgate/dto'
import {
  fifoLinkageRate,
  maxPositionEntropy,
  mean,
  meanObservationDelay,
  PositionSample,
  positionEntropy,
  predictedLinkageRate,
  spearmanRho,
  timingCorrelationRatio,
} from '@mixgate/math'
import { BatchAccumulator } from '../services/BatchAccumulator'
import { permuter } from '../services/Permuter'

export type CorrelationOptions = {
  transactions: number
  maxBatchSize: number
  batchTimeWindowMs: number
  /** mean of the exponential inter-arrival distribution */
  meanInterArrivalMs: number
  seedPolicy: SeedPolicy
  /** uniform [0, 1) source for inter-arrival times */
  random?: () => number
  randomBytes?: (n: number) => Uint8Array
}

export type CorrelationReport = {
  transactions: number
  batches: number
  seedPolicy: SeedPolicy
  avgBatchSize: number
  timingRatio: number
  meanDelayMs: number
  meanSpearmanRho: number
  positionEntropy: number
  maxPositionEntropy: number
  fifoLinkage: { direct: number; batched: number }
  /** adversary that knows the batch id and replays the batch-id-derived shuffle */
  idAwareLinkage: number
}

/** order[k] = index, within the batch's arrival order, of the k-th forwarded envelope */
export function forwardingOrder(batch: Pick<Batch, 'envelopes'>): number[] {
  const sequences = batch.envelopes.map(e => e.arrivalSequence)
  const sorted = [...sequences].sort((a, b) => a - b)
  return sequences.map(s => sorted.indexOf(s))
}

// What an observer who knows the id predicts, assuming the batch-id seed derivation.
function idAwarePrediction(batch: Batch): number[] {
  const arrival = [...batch.envelopes].sort((a, b) => a.arrivalSequence - b.arrivalSequence)
  const replayed = permuter.permute(arrival, permuter.deriveSeedFromBatchId(batch.id))
  return forwardingOrder({ envelopes: replayed })
}

export function runCorrelationAnalysis(opts: CorrelationOptions): CorrelationReport {
  if (!Number.isInteger(opts.transactions) || opts.transactions < 1) {
    throw new RangeError(`transactions must be a positive integer, got ${opts.transactions}`)
  }
  const random = opts.random ?? Math.random
  let now = 0
  let seq = 0
  const accumulator = new BatchAccumulator({
    maxBatchSize: opts.maxBatchSize,
    batchTimeWindowMs: opts.batchTimeWindowMs,
    seedPolicy: opts.seedPolicy,
    clock: () => now,
    randomBytes: opts.randomBytes ?? ((n: number) => crypto.randomBytes(n)),
    idFactory: () => `sim-${String(seq++).padStart(6, '0')}`,
  })
  const batches: Batch[] = []
  const unsubscribe = accumulator.onSealed(b => { batches.push(b) })

  const submittedAt: number[] = []
  for (let i = 0; i < opts.transactions; i++) {
    now += -Math.log(1 - random()) * opts.meanInterArrivalMs
    // the periodic actor would have fired by now
    accumulator.pollTimeTrigger()
    submittedAt.push(now)
    const payload = Buffer.alloc(8)
    payload.writeUInt32BE(i, 4)
    accumulator.submit(payload)
  }
  now += opts.batchTimeWindowMs
  accumulator.pollTimeTrigger()
  accumulator.flush()
  unsubscribe()

  const observedAt = new Array<number>(opts.transactions).fill(0)
  for (const b of batches) for (const e of b.envelopes) observedAt[e.arrivalSequence] = b.sealedAt

  const rhos: number[] = []
  const samples: PositionSample[] = []
  let fifoHits = 0
  let idHits = 0
  for (const b of batches) {
    const order = forwardingOrder(b)
    const n = order.length
    fifoHits += fifoLinkageRate(order) * n
    idHits += predictedLinkageRate(order, idAwarePrediction(b)) * n
    if (n >= 2) rhos.push(spearmanRho(order, order.map((_, k) => k)))
    if (n === opts.maxBatchSize) order.forEach((arrival, forward) => samples.push({ arrival, forward }))
  }

  return {
    transactions: opts.transactions,
    batches: batches.length,
    seedPolicy: opts.seedPolicy,
    avgBatchSize: opts.transactions / batches.length,
    timingRatio: timingCorrelationRatio(submittedAt, observedAt),
    meanDelayMs: meanObservationDelay(submittedAt, observedAt),
    meanSpearmanRho: rhos.length ? mean(rhos) : 1,
    positionEntropy: positionEntropy(samples, opts.maxBatchSize),
    maxPositionEntropy: maxPositionEntropy(opts.maxBatchSize),
    fifoLinkage: { direct: fifoLinkageRate(submittedAt.map((_, i) => i)), batched: fifoHits / opts.transactions },
    idAwareLinkage: idHits / opts.transactions,
  }
}

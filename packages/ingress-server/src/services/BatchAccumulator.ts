import crypto from 'crypto'
import { hexlify } from 'ethers'
import { ulid } from 'ulid'
import { Batch, Envelope, SealTrigger, SeedPolicy } from '@mixgate/dto'
import { InvalidEnvelopeError } from '@mixgate/reasons'
import { CommitmentScheme, commitmentScheme } from './CommitmentScheme'
import { Permuter, permuter } from './Permuter'
import { getLogger, logSeal } from '../utils/logger'
import { CONSTANTS } from '../config'

export type SealListener = (batch: Batch) => void

export interface BatchAccumulatorOptions {
  maxBatchSize: number
  batchTimeWindowMs: number
  seedPolicy?: SeedPolicy
  /** time-triggered or flushed batches smaller than this are reported as weak anonymity sets */
  minAnonymitySet?: number
  clock?: () => number
  randomBytes?: (n: number) => Uint8Array
  idFactory?: () => string
  scheme?: CommitmentScheme
  permuter?: Permuter
}

/**
 * BatchAccumulator
 *
 * Owns the pending envelope sequence and `lastSealTime`. Both are only ever touched by the
 * synchronous methods below; with no await between reading and resetting them, the event loop is
 * the single mutual-exclusion domain and drain-and-reset cannot interleave with a submit or a poll.
 *
 * Seals on size (inside submit) or on elapsed time (pollTimeTrigger). Every seal, whatever its
 * trigger, is delivered to onSealed listeners.
 */
export class BatchAccumulator {
  public readonly maxBatchSize: number
  public readonly batchTimeWindowMs: number
  public readonly seedPolicy: SeedPolicy
  public readonly minAnonymitySet: number

  private pending: Envelope[] = []
  private lastSealTime: number
  private nextSequence = 0
  private listeners = new Set<SealListener>()

  private readonly clock: () => number
  private readonly randomBytes: (n: number) => Uint8Array
  private readonly idFactory: () => string
  private readonly scheme: CommitmentScheme
  private readonly permuter: Permuter

  constructor(opts: BatchAccumulatorOptions) {
    if (!Number.isInteger(opts.maxBatchSize) || opts.maxBatchSize < 1) {
      throw new RangeError(`maxBatchSize must be a positive integer, got ${opts.maxBatchSize}`)
    }
    if (!(opts.batchTimeWindowMs > 0)) {
      throw new RangeError(`batchTimeWindowMs must be > 0, got ${opts.batchTimeWindowMs}`)
    }
    this.maxBatchSize = opts.maxBatchSize
    this.batchTimeWindowMs = opts.batchTimeWindowMs
    this.seedPolicy = opts.seedPolicy ?? SeedPolicy.BATCH_ID
    this.minAnonymitySet = opts.minAnonymitySet ?? opts.maxBatchSize
    this.clock = opts.clock ?? Date.now
    this.randomBytes = opts.randomBytes ?? ((n: number) => crypto.randomBytes(n))
    this.idFactory = opts.idFactory ?? (() => ulid())
    this.scheme = opts.scheme ?? commitmentScheme
    this.permuter = opts.permuter ?? permuter
    this.lastSealTime = this.clock()
  }

  get pendingCount(): number {
    return this.pending.length
  }

  /** Subscribe to sealed batches. Returns an unsubscribe function. */
  public onSealed(listener: SealListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  /**
   * Enqueue a payload. Throws InvalidEnvelopeError for an empty payload.
   * Reaching maxBatchSize seals synchronously before returning.
   */
  public submit(payload: Uint8Array): Envelope {
    if (!(payload instanceof Uint8Array) || payload.length === 0) {
      throw new InvalidEnvelopeError({ length: payload instanceof Uint8Array ? payload.length : 0 })
    }
    const envelope: Envelope = Object.freeze({
      payload: Uint8Array.from(payload),
      arrivalSequence: this.nextSequence++,
    })
    this.pending.push(envelope)
    if (this.pending.length >= this.maxBatchSize) {
      // The envelope is accepted either way; a failed seal leaves it pending for the next trigger.
      try {
        this.seal(SealTrigger.SIZE)
      } catch (e) {
        getLogger().error({ event: 'batch.seal_failed', reason_code: 'INTERNAL_ERROR', trigger: SealTrigger.SIZE, pending: this.pending.length, err: e instanceof Error ? e.message : String(e) })
      }
    }
    return envelope
  }

  /** Seal if the time window has elapsed since the last seal. No side effects when pending is empty. */
  public pollTimeTrigger(): Batch | null {
    if (this.clock() - this.lastSealTime < this.batchTimeWindowMs) return null
    return this.seal(SealTrigger.TIME)
  }

  /** Seal whatever is pending regardless of thresholds (shutdown path). */
  public flush(): Batch | null {
    return this.seal(SealTrigger.FLUSH)
  }

  // The only places pending and lastSealTime change together.
  private drain(): { taken: Envelope[]; previousSealTime: number } | null {
    if (this.pending.length === 0) return null
    const drained = { taken: this.pending, previousSealTime: this.lastSealTime }
    this.pending = []
    this.lastSealTime = this.clock()
    return drained
  }

  private restore(drained: { taken: Envelope[]; previousSealTime: number }): void {
    this.pending = drained.taken.concat(this.pending)
    this.lastSealTime = drained.previousSealTime
  }

  private seal(trigger: SealTrigger): Batch | null {
    const drained = this.drain()
    if (!drained) return null
    let batch: Batch
    try {
      batch = this.build(drained.taken, trigger)
    } catch (e) {
      this.restore(drained)
      throw e
    }
    logSeal({ batch, pendingAfter: this.pending.length, minAnonymitySet: this.minAnonymitySet })
    this.notify(batch)
    return batch
  }

  // Works on data owned exclusively by this seal; throwing leaves nothing half-sealed.
  private build(arrivalOrder: Envelope[], trigger: SealTrigger): Batch {
    const nonce = hexlify(this.randomBytes(CONSTANTS.NONCE_BYTES))
    const commitment = this.scheme.commit(arrivalOrder, nonce)
    const id = this.idFactory()

    let shuffleSeed: string | undefined
    let seed: string
    if (this.seedPolicy === SeedPolicy.SECRET) {
      shuffleSeed = hexlify(this.randomBytes(CONSTANTS.SEED_BYTES))
      seed = shuffleSeed
    } else {
      seed = this.permuter.deriveSeedFromBatchId(id)
    }
    const envelopes = Object.freeze(this.permuter.permute(arrivalOrder, seed))

    return Object.freeze({
      id,
      envelopes,
      nonce,
      commitment,
      sealedAt: this.lastSealTime,
      trigger,
      seedPolicy: this.seedPolicy,
      ...(shuffleSeed !== undefined ? { shuffleSeed } : {}),
    })
  }

  private notify(batch: Batch): void {
    for (const listener of this.listeners) {
      try {
        listener(batch)
      } catch (e) {
        getLogger().error({ event: 'batch.listener_failed', batch_id: batch.id, err: e instanceof Error ? e.message : String(e) })
      }
    }
  }
}

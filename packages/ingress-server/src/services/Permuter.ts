import { getBytes, hexlify, toUtf8Bytes } from 'ethers'
import { Batch, Envelope, SeedPolicy } from '@mixgate/dto'
import { sha256 } from './CommitmentScheme'

/**
 * HashDrbg
 * Deterministic byte stream: block_i = sha256(seed || uint32be(i)).
 * Anyone holding the seed can replay the exact stream, which is what lets a relay or auditor
 * reproduce a batch's forwarding order.
 */
export class HashDrbg {
  private readonly seed: Buffer
  private counter = 0
  private pool: Buffer = Buffer.alloc(0)

  constructor(seed: string | Uint8Array) {
    this.seed = Buffer.from(typeof seed === 'string' ? getBytes(seed) : seed)
  }

  public nextUint32(): number {
    if (this.pool.length < 4) {
      const ctr = Buffer.alloc(4)
      ctr.writeUInt32BE(this.counter++)
      this.pool = Buffer.concat([this.pool, sha256(Buffer.concat([this.seed, ctr]))])
    }
    const v = this.pool.readUInt32BE(0)
    this.pool = this.pool.subarray(4)
    return v
  }

  /** Uniform integer in [0, bound). Rejection sampling removes modulo bias. */
  public nextBelow(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0 || bound > 0x1_0000_0000) {
      throw new RangeError(`bound must be an integer in [1, 2^32], got ${bound}`)
    }
    const limit = Math.floor(0x1_0000_0000 / bound) * bound
    for (;;) {
      const r = this.nextUint32()
      if (r < limit) return r % bound
    }
  }
}

/**
 * Permuter
 * Seeded Fisher-Yates shuffle. Same seed and same input order give the same output order;
 * with a uniformly random seed every permutation is equally likely.
 */
export class Permuter {
  public permute<T>(items: readonly T[], seed: string): T[] {
    const out = [...items]
    const rng = new HashDrbg(seed)
    for (let i = out.length - 1; i > 0; i--) {
      const j = rng.nextBelow(i + 1)
      const tmp = out[i]
      out[i] = out[j]
      out[j] = tmp
    }
    return out
  }

  /**
   * seed = sha256(utf8(batchId)).
   * NOTE: the batch id is public (it accompanies the commitment), so under this policy anyone who
   * sees the id can recompute the forwarding order. Use SeedPolicy.SECRET to keep the order
   * unpredictable until reveal.
   */
  public deriveSeedFromBatchId(batchId: string): string {
    return hexlify(sha256(toUtf8Bytes(batchId)))
  }

  /** The seed a verifier should use for `batch`, or null if a secret seed was not disclosed. */
  public seedFor(batch: Pick<Batch, 'id' | 'seedPolicy' | 'shuffleSeed'>): string | null {
    if (batch.seedPolicy === SeedPolicy.SECRET) return batch.shuffleSeed ?? null
    return this.deriveSeedFromBatchId(batch.id)
  }

  /**
   * Replays the shuffle from arrival order and checks it reproduces the batch's forwarding order.
   */
  public verifyForwardingOrder(batch: Pick<Batch, 'id' | 'seedPolicy' | 'shuffleSeed' | 'envelopes'>): boolean {
    const seed = this.seedFor(batch)
    if (seed === null) return false
    const arrivalOrder = [...batch.envelopes].sort((a, b) => a.arrivalSequence - b.arrivalSequence)
    const replayed = this.permute<Envelope>(arrivalOrder, seed)
    return replayed.every((e, i) => e.arrivalSequence === batch.envelopes[i].arrivalSequence)
  }
}

export const permuter = new Permuter()

import { SealTrigger, SeedPolicy } from './enums'

/**
 * A single submitted transaction awaiting (or sealed into) a batch.
 * Freezing does not reach into `payload`: its bytes are shared by every listener of the sealed
 * batch and must be treated as read-only.
 */
export interface Envelope {
  readonly payload: Uint8Array
  /** assigned by the accumulator at intake; strictly increasing per accumulator */
  readonly arrivalSequence: number
}

/**
 * A sealed, immutable group of envelopes.
 * `envelopes` is in forwarding (post-permutation) order. `commitment` binds the sorted
 * payload hash set plus `nonce`, so it carries no ordering information.
 */
export interface Batch {
  readonly id: string
  readonly envelopes: readonly Envelope[]
  readonly nonce: string
  readonly commitment: string
  readonly sealedAt: number
  readonly trigger: SealTrigger
  readonly seedPolicy: SeedPolicy
  /** only set under SeedPolicy.SECRET; disclosed with the reveal */
  readonly shuffleSeed?: string
}

export interface CommitmentRecord {
  readonly batchId: string
  readonly commitment: string
  readonly recordedAt: number
}

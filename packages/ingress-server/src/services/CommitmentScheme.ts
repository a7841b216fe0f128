import crypto from 'crypto'
import { getBytes, hexlify, isHexString } from 'ethers'
import { Envelope } from '@mixgate/dto'

export const DIGEST_BYTES = 32

export function sha256(data: Uint8Array): Buffer {
  return crypto.createHash('sha256').update(data).digest()
}

/**
 * CommitmentScheme
 *
 * commitment = sha256( sort(sha256(payload_i)) || nonce )
 *
 * Per-envelope digests are sorted bytewise before concatenation, so the commitment depends only on
 * the multiset of payloads and the nonce: neither arrival nor forwarding order can be read from it.
 * The nonce is appended last. Pure; no state.
 */
export class CommitmentScheme {
  public hashPayload(payload: Uint8Array): string {
    return hexlify(sha256(payload))
  }

  public commit(envelopes: readonly Envelope[], nonce: string): string {
    const digests = envelopes.map(e => sha256(e.payload))
    digests.sort(Buffer.compare)
    const input = Buffer.concat([...digests, getBytes(nonce)])
    return hexlify(sha256(input))
  }

  /** Exact byte equality with the recomputed commitment; malformed claims are simply false. */
  public verify(envelopes: readonly Envelope[], nonce: string, claimedCommitment: string): boolean {
    if (!isHexString(claimedCommitment, DIGEST_BYTES) || !isHexString(nonce, true)) return false
    const expected = getBytes(this.commit(envelopes, nonce))
    const claimed = getBytes(claimedCommitment)
    return crypto.timingSafeEqual(expected, claimed)
  }
}

export const commitmentScheme = new CommitmentScheme()

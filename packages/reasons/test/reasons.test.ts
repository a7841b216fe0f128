import { REASONS } from '../src/registry'
import { reason } from '../src/factory'
import { IngressRejection, InvalidEnvelopeError, CommitmentNotFoundError, CommitmentMismatchError } from '../src/errors'

describe('reasons factory', () => {
  test('factory-defaults: exact match for canonical codes', () => {
    const r = reason('CLIENT_BAD_REQUEST')
    expect(r).toEqual(REASONS.CLIENT_BAD_REQUEST)
  })

  test('override-context: merges new message and context', () => {
    const r = reason('COMMITMENT_MISMATCH', { message: 'custom', context: { batch_id: 'b1' } })
    expect(r.message).toBe('custom')
    expect(r.context).toEqual({ batch_id: 'b1' })
    expect(r.http_status).toBe(REASONS.COMMITMENT_MISMATCH.http_status)
  })

  test('client codes cover unknown routes and oversized bodies', () => {
    expect(reason('CLIENT_NOT_FOUND').http_status).toBe(404)
    expect(reason('CLIENT_TOO_LARGE', { context: { limit_bytes: 1024 } })).toEqual({
      code: 'CLIENT_TOO_LARGE',
      category: REASONS.CLIENT_TOO_LARGE.category,
      http_status: 413,
      message: 'Request body exceeds the configured limit',
      context: { limit_bytes: 1024 },
    })
  })

  test('empty overrides leave context undefined', () => {
    expect(reason('INTERNAL_ERROR', {}).context).toBeUndefined()
  })
})

describe('IngressRejection', () => {
  test('error-class-shape', () => {
    const err = new InvalidEnvelopeError({ length: 0 })
    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(IngressRejection)
    expect(err.name).toBe('InvalidEnvelopeError')
    expect(err.reason.code).toBe('ENVELOPE_INVALID')
    expect(err.reason.http_status).toBe(400)
    expect(err.reason.context).toEqual({ length: 0 })
  })

  test('ledger errors carry the batch id', () => {
    const missing = new CommitmentNotFoundError('01HBATCH')
    expect(missing.batchId).toBe('01HBATCH')
    expect(missing.reason.code).toBe('COMMITMENT_NOT_FOUND')
    expect(missing.reason.context).toEqual({ batch_id: '01HBATCH' })

    const mismatch = new CommitmentMismatchError('01HBATCH')
    expect(mismatch.reason.code).toBe('COMMITMENT_MISMATCH')
    expect(mismatch.message).toBe(REASONS.COMMITMENT_MISMATCH.message)
  })
})

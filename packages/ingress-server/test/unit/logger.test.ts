import { Batch, SealTrigger, SeedPolicy } from '@mixgate/dto'
import * as loggerModule from '../../src/utils/logger'
import { captureLogger } from '../helpers/fakes'

function batchOf(size: number, trigger: SealTrigger): Batch {
  return {
    id: 'b-1',
    envelopes: Array.from({ length: size }, (_, i) => ({ payload: Uint8Array.of(0xc0, i), arrivalSequence: i })),
    nonce: '0x' + '5a'.repeat(32),
    commitment: '0x' + '33'.repeat(32),
    sealedAt: Date.UTC(2024, 0, 2, 3, 4, 5),
    trigger,
    seedPolicy: SeedPolicy.SECRET,
    shuffleSeed: '0x' + '6b'.repeat(32),
  }
}

describe('logger utilities', () => {
  let capture: ReturnType<typeof captureLogger>
  const original = loggerModule.getLogger()

  beforeEach(() => {
    capture = captureLogger('info')
    loggerModule.setLogger(capture.logger)
  })

  afterEach(() => {
    loggerModule.setLogger(original)
  })

  test('logSeal logs batch.sealed without nonce, seed or payloads', () => {
    loggerModule.logSeal({ batch: batchOf(3, SealTrigger.SIZE), pendingAfter: 0, minAnonymitySet: 3 })
    const records = capture.records()
    expect(records).toHaveLength(1)
    expect(records[0]).toMatchObject({
      level: 30,
      event: 'batch.sealed',
      batch_id: 'b-1',
      size: 3,
      trigger: 'size',
      seed_policy: 'secret',
      commitment: '0x' + '33'.repeat(32),
      sealed_at: '2024-01-02T03:04:05.000Z',
      pending_after: 0,
    })
    const raw = capture.lines.join('')
    expect(raw).not.toContain('5a'.repeat(32))
    expect(raw).not.toContain('6b'.repeat(32))
  })

  test('logSeal warns when a time-triggered batch is below the anonymity threshold', () => {
    loggerModule.logSeal({ batch: batchOf(2, SealTrigger.TIME), minAnonymitySet: 5 })
    const records = capture.records()
    expect(records.map(r => r.event)).toEqual(['batch.sealed', 'batch.small_anonymity_set'])
    expect(records[1]).toMatchObject({ level: 40, size: 2, min_anonymity_set: 5, trigger: 'time' })
  })

  test('logSeal does not warn for size-triggered batches', () => {
    loggerModule.logSeal({ batch: batchOf(2, SealTrigger.SIZE), minAnonymitySet: 5 })
    expect(capture.records().map(r => r.event)).toEqual(['batch.sealed'])
  })

  test('logVerification logs info on success and warn on rejection', () => {
    loggerModule.logVerification({ batchId: 'b-1', ok: true })
    loggerModule.logVerification({ batchId: 'b-2', ok: false, reason_code: 'COMMITMENT_MISMATCH' })
    const [ok, rejected] = capture.records()
    expect(ok).toMatchObject({ level: 30, event: 'reveal.verified', batch_id: 'b-1' })
    expect(rejected).toMatchObject({ level: 40, event: 'reveal.rejected', batch_id: 'b-2', reason_code: 'COMMITMENT_MISMATCH' })
  })

  test('logForward warns when any relay failed', () => {
    loggerModule.logForward({ batchId: 'b-1', size: 2, latency_ms: 7, relays: [{ relay: 'a', ok: true }] })
    loggerModule.logForward({ batchId: 'b-2', size: 2, latency_ms: 9, relays: [{ relay: 'a', ok: true }, { relay: 'b', ok: false, error: 'HTTP 503' }] })
    const [first, second] = capture.records()
    expect(first).toMatchObject({ level: 30, event: 'batch.forwarded', latency_ms: 7 })
    expect(second).toMatchObject({ level: 40, event: 'batch.forwarded', batch_id: 'b-2', reason_code: 'RELAY_UNAVAILABLE', failed_relays: 1 })
    expect(first.reason_code).toBeUndefined()
  })

  test('logHttp logs http.request', () => {
    loggerModule.logHttp({ path: '/x', method: 'GET', status: 200, corr_id: 'c3', latency_ms: 12 })
    expect(capture.records()[0]).toMatchObject({ event: 'http.request', path: '/x', status: 200, corr_id: 'c3' })
  })
})

import request from 'supertest'
import { hexlify } from 'ethers'
import { Registry } from 'prom-client'
import { SeedPolicy } from '@mixgate/dto'
import { AppOptions, createApp } from '../../src/http'
import { BatchAccumulator } from '../../src/services/BatchAccumulator'
import { CommitRevealLedger } from '../../src/services/CommitRevealLedger'
import { commitmentScheme } from '../../src/services/CommitmentScheme'
import { IngressService } from '../../src/services/IngressService'
import { MetricsTracker } from '../../src/services/MetricsTracker'
import { MemoryAuditSink } from '../../src/utils/auditLog'
import { setLogger } from '../../src/utils/logger'
import { captureLogger, deferred, deterministicBytes, FakeTransport, ManualClock, sequentialIds } from '../helpers/fakes'

function setup(seedPolicy: SeedPolicy = SeedPolicy.BATCH_ID, appOptions: AppOptions = {}) {
  const clock = new ManualClock()
  const transport = new FakeTransport()
  const metrics = new MetricsTracker({ registry: new Registry() })
  const service = new IngressService({
    accumulator: new BatchAccumulator({
      maxBatchSize: 2,
      batchTimeWindowMs: 1000,
      seedPolicy,
      clock: clock.read,
      randomBytes: deterministicBytes('http'),
      idFactory: sequentialIds(),
    }),
    ledger: new CommitRevealLedger(commitmentScheme, clock.read),
    transport,
    metrics,
    audit: new MemoryAuditSink(),
    clock: clock.read,
  })
  return { app: createApp(service, metrics, appOptions), service, transport }
}

describe('http api', () => {
  beforeEach(() => {
    setLogger(captureLogger('silent').logger)
  })

  test('POST /tx accepts a hex payload', async () => {
    const { app } = setup()
    const res = await request(app).post('/tx').send({ tx: '0x0102' })
    expect(res.status).toBe(202)
    expect(res.body).toEqual({ status: 'accepted', arrival_sequence: 0, pending: 1 })
  })

  test('POST /tx rejects non-hex input with the caller correlation id', async () => {
    const { app } = setup()
    const res = await request(app).post('/tx').set('x-corr-id', 'corr_test').send({ tx: 'zz' })
    expect(res.status).toBe(400)
    expect(res.headers['x-corr-id']).toBe('corr_test')
    expect(res.body.corr_id).toBe('corr_test')
    expect(res.body.reason.code).toBe('CLIENT_BAD_REQUEST')
    expect(typeof res.body.ts).toBe('string')
  })

  test('POST /tx rejects an empty payload as an invalid envelope', async () => {
    const { app, service } = setup()
    const res = await request(app).post('/tx').send({ tx: '0x' })
    expect(res.status).toBe(400)
    expect(res.body.reason.code).toBe('ENVELOPE_INVALID')
    expect(res.body.corr_id).toMatch(/^corr_/)
    expect(service.pendingCount).toBe(0)
  })

  test('POST /tx accepts a 64 KiB transaction under the default body limit', async () => {
    const { app, service } = setup()
    const res = await request(app).post('/tx').send({ tx: hexlify(new Uint8Array(64 * 1024).fill(7)) })
    expect(res.status).toBe(202)
    expect(res.body).toEqual({ status: 'accepted', arrival_sequence: 0, pending: 1 })
    expect(service.pendingCount).toBe(1)
  })

  test('a body over the configured limit is a 413 client error', async () => {
    const { app, service } = setup(SeedPolicy.BATCH_ID, { maxBodyBytes: 1024 })
    const res = await request(app).post('/tx').send({ tx: hexlify(new Uint8Array(1024).fill(7)) })
    expect(res.status).toBe(413)
    expect(res.body.reason.code).toBe('CLIENT_TOO_LARGE')
    expect(res.body.reason.context).toEqual({ limit_bytes: 1024 })
    expect(service.pendingCount).toBe(0)
  })

  test('unknown routes are CLIENT_NOT_FOUND', async () => {
    const { app } = setup()
    const res = await request(app).get('/nope')
    expect(res.status).toBe(404)
    expect(res.body.reason.code).toBe('CLIENT_NOT_FOUND')
    expect(res.body.reason.context).toEqual({ method: 'GET', path: '/nope' })
  })

  test('malformed JSON is a bad request', async () => {
    const { app } = setup()
    const res = await request(app).post('/tx').set('Content-Type', 'application/json').send('{"tx":')
    expect(res.status).toBe(400)
    expect(res.body.reason.code).toBe('CLIENT_BAD_REQUEST')
    expect(res.body.reason.message).toBe('Malformed JSON body')
  })

  test('unexpected errors become INTERNAL_ERROR', async () => {
    const { app, service } = setup()
    jest.spyOn(service, 'submitTransaction').mockImplementation(() => { throw new Error('boom') })
    const res = await request(app).post('/tx').send({ tx: '0x01' })
    expect(res.status).toBe(500)
    expect(res.body.reason.code).toBe('INTERNAL_ERROR')
  })

  test('GET /batches/:id/commitment before and after sealing', async () => {
    const { app, transport, service } = setup()
    const missing = await request(app).get('/batches/batch-0/commitment')
    expect(missing.status).toBe(404)
    expect(missing.body.reason.code).toBe('COMMITMENT_NOT_FOUND')
    expect(missing.body.reason.context).toEqual({ batch_id: 'batch-0' })

    await request(app).post('/tx').send({ tx: '0x01' })
    await request(app).post('/tx').send({ tx: '0x02' })
    await service.whenIdle()
    const res = await request(app).get('/batches/batch-0/commitment')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ batch_id: 'batch-0', commitment: transport.forwarded[0].commitment, recorded_at: '1970-01-01T00:00:00.000Z' })
  })

  test('GET /batches/:id/reveal only after the batch was forwarded', async () => {
    const { app, transport, service } = setup()
    const gate = deferred<void>()
    transport.gate = gate.promise
    await request(app).post('/tx').send({ tx: '0x01' })
    await request(app).post('/tx').send({ tx: '0x02' })

    const early = await request(app).get('/batches/batch-0/reveal')
    expect(early.status).toBe(404)
    expect(early.body.reason.code).toBe('REVEAL_NOT_AVAILABLE')

    gate.resolve()
    await service.whenIdle()
    const batch = transport.forwarded[0]
    const res = await request(app).get('/batches/batch-0/reveal')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      batch_id: 'batch-0',
      commitment: batch.commitment,
      nonce: batch.nonce,
      seed_policy: 'batch-id',
      sealed_at: '1970-01-01T00:00:00.000Z',
      trigger: 'size',
      txs: batch.envelopes.map(e => hexlify(e.payload)),
    })
  })

  test('reveal discloses the shuffle seed under the secret policy', async () => {
    const { app, transport, service } = setup(SeedPolicy.SECRET)
    await request(app).post('/tx').send({ tx: '0x01' })
    await request(app).post('/tx').send({ tx: '0x02' })
    await service.whenIdle()
    const res = await request(app).get('/batches/batch-0/reveal')
    expect(res.body.seed_policy).toBe('secret')
    expect(res.body.shuffle_seed).toBe(transport.forwarded[0].shuffleSeed)
  })

  test('POST /batches/verify checks claimed contents', async () => {
    const { app, transport, service } = setup()
    await request(app).post('/tx').send({ tx: '0xaa' })
    await request(app).post('/tx').send({ tx: '0xbb' })
    await service.whenIdle()
    const { nonce } = transport.forwarded[0]

    const ok = await request(app).post('/batches/verify').send({ batch_id: 'batch-0', nonce, txs: ['0xbb', '0xaa'] })
    expect(ok.status).toBe(200)
    expect(ok.body).toEqual({ valid: true })

    const bad = await request(app).post('/batches/verify').send({ batch_id: 'batch-0', nonce, txs: ['0xbb', '0xab'] })
    expect(bad.status).toBe(200)
    expect(bad.body.valid).toBe(false)
    expect(bad.body.reason.code).toBe('COMMITMENT_MISMATCH')

    const invalid = await request(app).post('/batches/verify').send({ batch_id: 'batch-0', nonce })
    expect(invalid.status).toBe(400)
    expect(invalid.body.reason.code).toBe('CLIENT_BAD_REQUEST')
  })

  test('GET /health reports pending and committed counts', async () => {
    const { app } = setup()
    await request(app).post('/tx').send({ tx: '0x01' })
    const res = await request(app).get('/health')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok', pending: 1, committed: 0 })
  })

  test('GET /metrics exposes the prometheus registry', async () => {
    const { app } = setup()
    await request(app).post('/tx').send({ tx: '0x01' })
    const res = await request(app).get('/metrics')
    expect(res.status).toBe(200)
    expect(res.headers['content-type']).toMatch(/^text\/plain/)
    expect(res.text).toContain('mixgate_pending_envelopes 1')
  })
})

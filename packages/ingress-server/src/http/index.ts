/**
 * HTTP router for the ingress server
 * Exposes `createApp()` to allow tests to mount the app without starting a server.
 */
import express from 'express'
import corr from './middleware/corr'
import postTx from './tx'
import { getCommitment, getReveal, postVerify } from './batches'
import { errorHandler, notFound } from './errors'
import { IngressService } from '../services/IngressService'
import { MetricsTracker } from '../services/MetricsTracker'
import { logHttp } from '../utils/logger'
import { CONSTANTS } from '../config'

export type AppOptions = {
  /** largest accepted JSON body in bytes */
  maxBodyBytes?: number
}

export function createApp(service: IngressService, metrics: MetricsTracker, opts: AppOptions = {}) {
  const app = express()
  app.use(corr)

  // one structured line per request once the response is sent
  app.use((req, res, next) => {
    const start = Date.now()
    res.on('finish', () => {
      logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: req.corr_id, latency_ms: Date.now() - start })
    })
    next()
  })

  app.use(express.json({ limit: opts.maxBodyBytes ?? CONSTANTS.MAX_BODY_BYTES }))

  app.post('/tx', postTx(service))
  app.get('/batches/:id/commitment', getCommitment(service))
  app.get('/batches/:id/reveal', getReveal(service))
  app.post('/batches/verify', postVerify(service))

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', pending: service.pendingCount, committed: service.committedCount })
  })

  app.get('/metrics', async (req, res, next) => {
    try {
      const body = await metrics.getPromMetrics()
      res.setHeader('Content-Type', metrics.contentType)
      res.status(200).end(body)
    } catch (e) {
      next(e)
    }
  })

  app.use(notFound)
  app.use(errorHandler)
  return app
}

export default createApp

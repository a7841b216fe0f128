import pino from 'pino'
import { setLogger } from './packages/ingress-server/src/utils/logger'

// quiet by default; tests that assert on log lines install their own capture
setLogger(pino({ level: 'silent' }))

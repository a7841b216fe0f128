/*
 * Runs the batching correlation analysis under both seed policies and logs the reports.
 *
 *   tsx packages/ingress-server/src/scripts/correlation-analysis.ts [transactions] [maxBatchSize] [windowMs] [meanInterArrivalMs]
 */
import { SeedPolicy } from '@mixgate/dto'
import { runCorrelationAnalysis } from '../analysis/correlation'
import { getLogger } from '../utils/logger'

function intArg(index: number, fallback: number): number {
  const raw = process.argv[index]
  if (raw === undefined) return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0) throw new Error(`argument ${index - 1} must be a positive integer, got "${raw}"`)
  return n
}

function main() {
  const log = getLogger()
  // per-seal lines would drown the report
  log.level = 'warn'
  const base = {
    transactions: intArg(2, 1000),
    maxBatchSize: intArg(3, 10),
    batchTimeWindowMs: intArg(4, 10_000),
    meanInterArrivalMs: intArg(5, 500),
  }
  for (const seedPolicy of [SeedPolicy.BATCH_ID, SeedPolicy.SECRET]) {
    const report = runCorrelationAnalysis({ ...base, seedPolicy })
    log.warn({ event: 'analysis.report', ...report })
  }
}

if (require.main === module) {
  try {
    main()
  } catch (e) {
    getLogger().fatal({ event: 'analysis.failed', err: e instanceof Error ? e.message : String(e) })
    process.exit(1)
  }
}

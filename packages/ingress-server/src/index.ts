// Public surface of the ingress server package: the batching core, its collaborators and the HTTP app.

export * from './services/BatchAccumulator'
export * from './services/CommitmentScheme'
export * from './services/Permuter'
export * from './services/CommitRevealLedger'
export * from './services/MetricsTracker'
export * from './services/RelayTransport'
export * from './services/IngressService'
export * from './utils/auditLog'
export { setLogger, getLogger } from './utils/logger'
export { loadConfig, getEnv, parseRelayUrls, DEFAULT_RELAY_URLS, CONSTANTS } from './config'
export type { IngressConfig, RelayEndpoint } from './config'
export { createApp } from './http'
export { runCorrelationAnalysis } from './analysis/correlation'
export type { CorrelationOptions, CorrelationReport } from './analysis/correlation'

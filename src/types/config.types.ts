export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface ListenAddress {
  host: string
  port: number
}

export interface Config {
  // System Config
  listenAddr: string
  listen: ListenAddress
  dbPath: string
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  registerRateLimit: number
  unregisterRateLimit: number
  // Poller Config
  pollingEnabled: boolean
  pollInterval: number // seconds
  maxConcurrent: number
  pollJitterRatio: number
  schedulerTickMs: number
  pollShutdownTimeoutMs: number
  // Dispatch Config
  dispatchEnabled: boolean
  dispatchConcurrency: number
  dispatchMaxAttempts: number
  dispatchBaseDelayMs: number
  dispatchMaxDelayMs: number
  dispatchTimeoutMs: number
  dispatchSweepSeconds: number
  dispatchDrainTimeoutMs: number
  // Platform Config
  platformBaseUrl: string
  platformBearerToken: string
  platformBadgePath: string
  platformNotificationsPath: string
  platformRequestTimeoutMs: number
  badgeCheckEnabled: boolean
  // Transaction Token Config
  tokenHeaderName: string
  tokenKeyTtlSeconds: number
  tokenKeyMetaName: string
  tokenMarkerRel: string
}

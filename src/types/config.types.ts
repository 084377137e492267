export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export type DatabaseType = 'sqlite' | 'postgres'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  enableConsoleOutput: boolean
  enableFileLogging: boolean
  closeGraceDelay: number
  // Database Config
  dbType: DatabaseType
  dbPath: string
  dbHost: string
  dbPort: number
  dbName: string
  dbUser: string
  dbPassword: string
  dbConnectionString: string
  // Upstream Config
  upstreamBaseUrl: string
  upstreamToken: string
  upstreamEmail: string
  upstreamPassword: string
  upstreamTimeoutMs: number
  // Sync Config
  syncIntervalMinutes: number
  syncConcurrency: number
  syncMaxRetries: number
  syncRetryBaseMs: number
  hydrateConcurrency: number
}

export type DatabaseConfig = Pick<
  Config,
  | 'dbType'
  | 'dbPath'
  | 'dbHost'
  | 'dbPort'
  | 'dbName'
  | 'dbUser'
  | 'dbPassword'
  | 'dbConnectionString'
>

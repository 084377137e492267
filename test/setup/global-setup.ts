/**
 * Global test setup
 *
 * Runs once before the workers start; forked workers inherit these values.
 */
export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3004'
  process.env.dbType = 'sqlite'
  process.env.enableConsoleOutput = 'false'
  process.env.enableFileLogging = 'false'
  process.env.syncIntervalMinutes = '0'
  process.env.upstreamBaseUrl = 'http://upstream.test/api/v2'
  process.env.upstreamToken = 'test-token'
  process.env.upstreamTimeoutMs = '2000'
  process.env.syncRetryBaseMs = '0'
}

/**
 * Global test setup
 *
 * Workers are forked after this runs and inherit the environment, which the
 * config plugin reads on every build().
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.enableConsoleOutput = 'false'
  process.env.listenAddr = '127.0.0.1:3004'
  process.env.dbPath = ':memory:'
  process.env.pollInterval = '60'
  process.env.maxConcurrent = '2'
  // Background loops stay off; tests drive the scheduler and dispatcher
  process.env.pollingEnabled = 'false'
  process.env.dispatchEnabled = 'false'
  process.env.platformBaseUrl = 'http://platform.test'
}

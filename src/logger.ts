/**
 * Logging seam. Defaults to the console; pass `silentLogger` or your own
 * implementation through the config.
 */

export type Logger = {
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export const consoleLogger: Logger = console

export const silentLogger: Logger = {
  warn() {},
  error() {},
}

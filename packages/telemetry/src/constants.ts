/**
 * Shared telemetry constants
 */

/** Root LogTape category; every logger in the workspace lives under it. */
export const ROOT_CATEGORY = 'fabriclab'

// ---------------------------------------------------------------------------
// Environment validation helpers
// ---------------------------------------------------------------------------

export const VALID_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const
export type LogLevel = (typeof VALID_LOG_LEVELS)[number]

export const VALID_ENVIRONMENTS = ['development', 'production', 'test'] as const
export type Environment = (typeof VALID_ENVIRONMENTS)[number]

export function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value)
}

function isEnvironment(value: string): value is Environment {
  return (VALID_ENVIRONMENTS as readonly string[]).includes(value)
}

export function validateLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  if (isLogLevel(value)) return value
  console.warn(`[telemetry] invalid LOG_LEVEL "${value}", defaulting to "info"`)
  return undefined
}

export function validateEnvironment(value: string | undefined): Environment | undefined {
  if (!value) return undefined
  if (isEnvironment(value)) return value
  console.warn(`[telemetry] invalid NODE_ENV "${value}", defaulting to "development"`)
  return undefined
}

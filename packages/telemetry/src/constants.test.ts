import { afterEach, describe, expect, it, vi } from 'vitest'
import { isLogLevel, validateEnvironment, validateLogLevel } from './constants.js'

describe('validateLogLevel', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('returns undefined for empty input', () => {
    expect(validateLogLevel(undefined)).toBeUndefined()
    expect(validateLogLevel('')).toBeUndefined()
  })

  it('accepts known levels', () => {
    expect(validateLogLevel('debug')).toBe('debug')
    expect(validateLogLevel('warning')).toBe('warning')
  })

  it('warns and returns undefined for unknown levels', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(validateLogLevel('verbose')).toBeUndefined()
    expect(warn).toHaveBeenCalledWith('[telemetry] invalid LOG_LEVEL "verbose", defaulting to "info"')
  })
})

describe('validateEnvironment', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('accepts known environments', () => {
    expect(validateEnvironment('production')).toBe('production')
  })

  it('warns on unknown environments', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(validateEnvironment('staging')).toBeUndefined()
    expect(warn).toHaveBeenCalledOnce()
  })
})

describe('isLogLevel', () => {
  it('narrows strings to log levels', () => {
    expect(isLogLevel('error')).toBe(true)
    expect(isLogLevel('warn')).toBe(false)
  })
})

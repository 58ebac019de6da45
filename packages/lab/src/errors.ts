import { formatArgv } from './runtime/format.js'

/** Base class for failures that abort a lab run. */
export class LabError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LabError'
  }
}

/**
 * A command exited non-zero at a step that does not tolerate failure.
 * The lab is left as it is; nothing is rolled back.
 */
export class CommandFailedError extends LabError {
  constructor(
    readonly container: string,
    readonly argv: readonly string[],
    readonly exitCode: number,
    readonly stderr: string
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : ''
    super(`Command failed in ${container} (exit ${exitCode}): ${formatArgv(argv)}${detail}`)
    this.name = 'CommandFailedError'
  }
}

/** The container runtime binary could not be started at all. */
export class RuntimeUnavailableError extends LabError {
  constructor(
    readonly binary: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Container runtime '${binary}' is not available: ${reason}`, { cause })
    this.name = 'RuntimeUnavailableError'
  }
}

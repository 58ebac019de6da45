import { CommandFailedError } from './errors.js'

export interface Attempt<T> {
  name: string
  run: () => Promise<T>
}

export interface AttemptFailure {
  name: string
  error: string
}

export type FallbackOutcome<T> =
  | { applied: true; via: string; value: T; failures: AttemptFailure[] }
  | { applied: false; failures: AttemptFailure[] }

export interface AttemptOptions {
  /**
   * Which errors mean "this variant is not supported, try the next one".
   * Anything else propagates. Defaults to non-zero command exits.
   */
  isUnsupported?: (error: unknown) => boolean
}

const isCommandFailure = (error: unknown): boolean => error instanceof CommandFailedError

/**
 * Capability probe with fallback: run each attempt in order until one
 * succeeds. Running out of attempts is reported, not thrown.
 */
export async function attemptInOrder<T>(
  attempts: readonly Attempt<T>[],
  options: AttemptOptions = {}
): Promise<FallbackOutcome<T>> {
  const isUnsupported = options.isUnsupported ?? isCommandFailure
  const failures: AttemptFailure[] = []

  for (const attempt of attempts) {
    try {
      const value = await attempt.run()
      return { applied: true, via: attempt.name, value, failures }
    } catch (error) {
      if (!isUnsupported(error)) throw error
      failures.push({
        name: attempt.name,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  return { applied: false, failures }
}

const UNKNOWN_COMMAND = /Unknown command/

/** Drop CLI complaints about commands this dialect does not know. */
export function filterUnknownCommand(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line !== '' && !UNKNOWN_COMMAND.test(line))
}

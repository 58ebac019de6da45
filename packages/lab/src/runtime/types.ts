export interface ExecResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Executes commands inside named containers, e.g. `docker exec`.
 *
 * Implementations resolve with the exit status of the command; only a
 * failure to reach the runtime itself rejects.
 */
export interface ContainerRuntime {
  readonly binary: string
  exec(container: string, argv: readonly string[]): Promise<ExecResult>
}

export interface ExecInvocation {
  container: string
  argv: readonly string[]
}

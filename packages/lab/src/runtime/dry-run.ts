import { formatInvocation } from './format.js'
import type { ContainerRuntime, ExecInvocation, ExecResult } from './types.js'

/**
 * Records every command instead of running it. Every command "succeeds"
 * with empty output, so a sequence driven by it walks the happy path.
 */
export class DryRunRuntime implements ContainerRuntime {
  readonly invocations: ExecInvocation[] = []

  constructor(readonly binary: string = 'docker') {}

  async exec(container: string, argv: readonly string[]): Promise<ExecResult> {
    this.invocations.push({ container, argv: [...argv] })
    return { stdout: '', stderr: '', exitCode: 0 }
  }

  commandLines(): string[] {
    return this.invocations.map((i) => formatInvocation(this.binary, i.container, i.argv))
  }
}

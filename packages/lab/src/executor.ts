import { getLogger } from '@fabriclab/telemetry'
import type { Logger } from '@fabriclab/telemetry'
import type { Argv } from './commands.js'
import { CommandFailedError } from './errors.js'
import { formatArgv } from './runtime/format.js'
import type { ContainerRuntime, ExecResult } from './runtime/types.js'

/**
 * Thin policy layer over a {@link ContainerRuntime}: either a step must
 * succeed (`run`) or its failure is expected and only logged (`tolerate`).
 */
export class CommandExecutor {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly logger: Logger = getLogger('lab', 'exec')
  ) {}

  async run(container: string, argv: Argv): Promise<ExecResult> {
    const result = await this.exec(container, argv)
    if (result.exitCode !== 0) {
      throw new CommandFailedError(container, argv, result.exitCode, result.stderr)
    }
    return result
  }

  async tolerate(container: string, argv: Argv, reason: string): Promise<ExecResult> {
    const result = await this.exec(container, argv)
    if (result.exitCode !== 0) {
      this.logger.warn('{container}: ignored exit {exitCode} ({reason}): {command}', {
        container,
        exitCode: result.exitCode,
        reason,
        command: formatArgv(argv),
      })
    }
    return result
  }

  private async exec(container: string, argv: Argv): Promise<ExecResult> {
    this.logger.debug('{container}$ {command}', { container, command: formatArgv(argv) })
    return this.runtime.exec(container, argv)
  }
}

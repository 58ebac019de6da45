import { VALID_LOG_LEVELS } from '@fabriclab/telemetry'
import { Command } from 'commander'
import { planCommand, runUp, upCommand, verifyCommand } from './commands/lab.js'

export function createProgram(): Command {
  const program = new Command('fabriclab')
    .description('Bring up a containerized BGP lab and check that its hosts can reach each other')
    .version('0.1.0')
    .option('--topology <file>', 'Topology JSON file (env: FABRICLAB_TOPOLOGY)')
    .option('--runtime <binary>', 'Container runtime CLI, e.g. docker or podman (env: CONTAINER_RUNTIME)')
    .option('--log-level <level>', `Log level (${VALID_LOG_LEVELS.join(', ')}) (env: LOG_LEVEL)`)
    .allowExcessArguments(false)
    .action(async (_options: unknown, cmd: Command) => {
      await runUp(cmd)
    })

  program.addCommand(upCommand())
  program.addCommand(verifyCommand())
  program.addCommand(planCommand())

  return program
}

import { allProbesPassed } from '@fabriclab/lab'
import { configureLogger } from '@fabriclab/telemetry'
import chalk from 'chalk'
import { Command } from 'commander'
import {
  planHandler,
  prepareLabHandler,
  upHandler,
  verifyHandler,
} from '../handlers/lab-handlers.js'
import type { PreparedLab } from '../handlers/lab-handlers.js'
import { ConsoleReporter } from '../reporter.js'
import { PlanInputSchema, UpInputSchema, VerifyInputSchema } from '../types.js'
import type { BaseCliConfig } from '../types.js'
import { parseOptionsOrExit } from './input.js'

async function prepareOrExit(input: BaseCliConfig): Promise<PreparedLab> {
  await configureLogger({ level: input.logLevel })
  const prepared = await prepareLabHandler(input)
  if (!prepared.success) {
    console.error(chalk.red(`✗ ${prepared.error}`))
    process.exit(1)
  }
  return prepared.data
}

function printProbeVerdict(passed: boolean): void {
  console.log(
    passed
      ? chalk.green('All connectivity probes passed.')
      : chalk.yellow('Some connectivity probes failed; see above.')
  )
}

/** Shared by `up` and the bare program invocation. */
export async function runUp(cmd: Command): Promise<void> {
  const input = parseOptionsOrExit(UpInputSchema, cmd)
  const lab = await prepareOrExit(input)
  const reporter = new ConsoleReporter()

  reporter.header(lab.topology)
  const result = await upHandler(lab, { reporter })

  if (!result.success) {
    console.error(chalk.red(`✗ Bring-up aborted: ${result.error}`))
    process.exit(1)
  }

  reporter.footer(lab.topology, lab.config.runtime)
  printProbeVerdict(allProbesPassed(result.data))
  process.exit(0)
}

export function upCommand(): Command {
  return new Command('up')
    .description('Configure the lab from scratch and verify connectivity')
    .action(async (_options: unknown, cmd: Command) => {
      await runUp(cmd)
    })
}

export function verifyCommand(): Command {
  return new Command('verify')
    .description('Show BGP sessions and probe host-to-host connectivity')
    .action(async (_options: unknown, cmd: Command) => {
      const input = parseOptionsOrExit(VerifyInputSchema, cmd)
      const lab = await prepareOrExit(input)
      const result = await verifyHandler(lab, { reporter: new ConsoleReporter() })

      if (!result.success) {
        console.error(chalk.red(`✗ Verification failed: ${result.error}`))
        process.exit(1)
      }

      printProbeVerdict(allProbesPassed(result.data))
      process.exit(0)
    })
}

export function planCommand(): Command {
  return new Command('plan')
    .description('Print every command the bring-up would run, without running it')
    .option('--no-waits', 'Leave out the sleep lines between phases')
    .action(async (_options: unknown, cmd: Command) => {
      const input = parseOptionsOrExit(PlanInputSchema, cmd)
      const lab = await prepareOrExit(input)
      const result = await planHandler(lab, input)

      if (!result.success) {
        console.error(chalk.red(`✗ ${result.error}`))
        process.exit(1)
      }

      for (const line of result.data.lines) {
        console.log(line)
      }
      process.exit(0)
    })
}

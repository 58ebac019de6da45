import { loadLabConfig, loadTopologyFile } from '@fabriclab/config'
import type { LabConfig, LabTopology } from '@fabriclab/config'
import { DockerRuntime, DryRunRuntime, LabSequencer, silentReporter } from '@fabriclab/lab'
import type {
  ContainerRuntime,
  LabReporter,
  LabRunReport,
  Sleep,
  VerificationReport,
} from '@fabriclab/lab'
import { getLogger } from '@fabriclab/telemetry'
import { ZodError } from 'zod'
import type { BaseCliConfig, CliResult, PlanInput } from '../types.js'

const logger = getLogger('cli')

export interface PreparedLab {
  config: LabConfig
  topology: LabTopology
}

export interface LabHandlerDeps {
  createRuntime?: (binary: string) => ContainerRuntime
  reporter?: LabReporter
  sleep?: Sleep
}

export type PrepareLabResult = CliResult<PreparedLab>
export type UpResult = CliResult<LabRunReport>
export type VerifyResult = CliResult<VerificationReport>
export type PlanResult = CliResult<{ lines: string[] }>

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return [
      'Invalid topology:',
      ...error.issues.map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`),
    ].join('\n')
  }
  return error instanceof Error ? error.message : String(error)
}

const dockerRuntime = (binary: string): ContainerRuntime => new DockerRuntime(binary)

/**
 * Resolve settings and load the topology they point at
 */
export async function prepareLabHandler(input: BaseCliConfig): Promise<PrepareLabResult> {
  try {
    const config = loadLabConfig({ topologyPath: input.topology, runtime: input.runtime })
    const topology = await loadTopologyFile(config.topologyPath)
    logger.info('Loaded topology {name} from {path}', {
      name: topology.name,
      path: config.topologyPath,
    })
    return { success: true, data: { config, topology } }
  } catch (error) {
    return { success: false, error: describeError(error) }
  }
}

/**
 * Full bring-up, phases 1 through 8
 */
export async function upHandler(lab: PreparedLab, deps: LabHandlerDeps = {}): Promise<UpResult> {
  try {
    const report = await createSequencer(lab, deps).run()
    return { success: true, data: report }
  } catch (error) {
    logger.error('Bring-up of {name} aborted: {error}', {
      name: lab.topology.name,
      error: describeError(error),
    })
    return { success: false, error: describeError(error) }
  }
}

/**
 * Verification only, against a lab that is already configured
 */
export async function verifyHandler(
  lab: PreparedLab,
  deps: LabHandlerDeps = {}
): Promise<VerifyResult> {
  try {
    const report = await createSequencer(lab, deps).verify()
    return { success: true, data: report }
  } catch (error) {
    return { success: false, error: describeError(error) }
  }
}

/**
 * Walk the bring-up against a dry-run runtime and render every command it
 * would issue, with `sleep` lines where the sequence waits.
 */
export async function planHandler(
  lab: PreparedLab,
  input: Pick<PlanInput, 'waits'>
): Promise<PlanResult> {
  const runtime = new DryRunRuntime(lab.config.runtime)
  const waits: Array<{ at: number; ms: number }> = []

  try {
    await new LabSequencer({
      topology: lab.topology,
      runtime,
      reporter: silentReporter,
      sleep: async (ms) => {
        waits.push({ at: runtime.invocations.length, ms })
      },
    }).run()
  } catch (error) {
    return { success: false, error: describeError(error) }
  }

  const sleepsAt = (position: number): string[] =>
    input.waits ? waits.filter((w) => w.at === position).map((w) => `sleep ${w.ms / 1000}`) : []

  const commands = runtime.commandLines()
  const lines: string[] = []
  commands.forEach((line, index) => {
    lines.push(...sleepsAt(index), line)
  })
  lines.push(...sleepsAt(commands.length))
  return { success: true, data: { lines } }
}

function createSequencer(lab: PreparedLab, deps: LabHandlerDeps): LabSequencer {
  const createRuntime = deps.createRuntime ?? dockerRuntime
  return new LabSequencer({
    topology: lab.topology,
    runtime: createRuntime(lab.config.runtime),
    reporter: deps.reporter,
    sleep: deps.sleep,
  })
}

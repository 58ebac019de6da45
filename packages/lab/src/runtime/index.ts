export { DockerRuntime } from './docker.js'
export { DryRunRuntime } from './dry-run.js'
export { formatArgv, formatInvocation, quoteArg } from './format.js'
export type { ContainerRuntime, ExecInvocation, ExecResult } from './types.js'

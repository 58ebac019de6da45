export { LabSequencer, allProbesPassed } from './sequencer.js'
export type {
  LabRunReport,
  LabSequencerOptions,
  SaveOutcome,
  Sleep,
  VerificationReport,
} from './sequencer.js'
export { CommandExecutor } from './executor.js'
export { attemptInOrder, filterUnknownCommand } from './fallback.js'
export type { Attempt, AttemptFailure, AttemptOptions, FallbackOutcome } from './fallback.js'
export { PHASES, silentReporter } from './reporter.js'
export type { LabReporter, PhaseInfo, ProbeResult, SessionSummary } from './reporter.js'
export { CommandFailedError, LabError, RuntimeUnavailableError } from './errors.js'
export * as commands from './commands.js'
export * from './runtime/index.js'

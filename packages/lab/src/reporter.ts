export interface PhaseInfo {
  index: number
  title: string
}

/** Bring-up phases in execution order. */
export const PHASES = {
  links: { index: 1, title: 'Bringing up link interfaces' },
  hostRoutes: { index: 2, title: 'Configuring host routes' },
  interfaces: { index: 3, title: 'Configuring interfaces' },
  stabilize: { index: 4, title: 'Waiting for interfaces to stabilize' },
  daemon: { index: 5, title: 'Enabling routing daemon' },
  peering: { index: 6, title: 'Configuring BGP' },
  convergence: { index: 7, title: 'Waiting for BGP sessions to establish' },
  verification: { index: 8, title: 'Verifying BGP sessions and connectivity' },
} as const satisfies Record<string, PhaseInfo>

export interface SessionSummary {
  node: string
  container: string
  output: string
}

export interface ProbeResult {
  from: string
  to: string
  address: string
  success: boolean
  output: string
}

/** User-facing narration of a run. Logging is separate and always on. */
export interface LabReporter {
  phase(phase: PhaseInfo): void
  progress(message: string): void
  done(message: string): void
  warn(message: string): void
  sessionSummary(summary: SessionSummary): void
  probe(result: ProbeResult): void
}

const noop = () => {}

export const silentReporter: LabReporter = {
  phase: noop,
  progress: noop,
  done: noop,
  warn: noop,
  sessionSummary: noop,
  probe: noop,
}

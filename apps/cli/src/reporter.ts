import chalk from 'chalk'
import type { ChalkInstance } from 'chalk'
import type { LabTopology } from '@fabriclab/config'
import type { LabReporter, ProbeResult, SessionSummary } from '@fabriclab/lab'

const RULE = '='.repeat(42)

export interface ConsoleReporterOptions {
  write?: (line: string) => void
  colors?: ChalkInstance
}

/** Terminal narration of a bring-up: step banners, check marks, probe verdicts. */
export class ConsoleReporter implements LabReporter {
  private readonly write: (line: string) => void
  private readonly colors: ChalkInstance

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line))
    this.colors = options.colors ?? chalk
  }

  header(topology: LabTopology): void {
    this.write(RULE)
    this.write(this.colors.bold(`Lab ${topology.name} - Complete Configuration`))
    this.write(RULE)
  }

  phase(phase: { index: number; title: string }): void {
    const title = `Step ${phase.index}: ${phase.title}...`
    this.write('')
    this.write(this.colors.cyan(title))
    this.write('-'.repeat(title.length))
  }

  progress(message: string): void {
    this.write(message)
  }

  done(message: string): void {
    this.write(this.colors.green(`✓ ${message}`))
  }

  warn(message: string): void {
    this.write(this.colors.yellow(`! ${message}`))
  }

  sessionSummary(summary: SessionSummary): void {
    this.write(this.colors.bold(`=== ${summary.container} BGP Summary ===`))
    if (summary.output.trim()) this.write(summary.output.trimEnd())
    this.write('')
  }

  probe(result: ProbeResult): void {
    if (result.output.trim()) this.write(result.output.trimEnd())
    const route = `${result.from} -> ${result.to}`
    this.write(
      result.success
        ? this.colors.green(`✓ ${route} SUCCESS`)
        : this.colors.red(`✗ ${route} FAILED`)
    )
  }

  /** Closing banner with the commands an operator can use to inspect the lab. */
  footer(topology: LabTopology, binary: string): void {
    const [source, target] = topology.hosts
    this.write('')
    this.write(RULE)
    this.write(this.colors.bold('Configuration Complete!'))
    this.write(RULE)
    this.write('')
    this.write('Verification commands:')
    this.write(`  - Check BGP neighbors: ${binary} exec <container> vtysh -c 'show ip bgp summary'`)
    this.write(`  - Check BGP routes:    ${binary} exec <container> vtysh -c 'show ip bgp'`)
    this.write(`  - Check routing table: ${binary} exec <container> vtysh -c 'show ip route'`)
    if (source && target) {
      this.write(`  - Test connectivity:   ${binary} exec ${source.container} ping ${target.address}`)
    }
  }
}

import { advertisedNetwork, neighborOf, routerIdOf } from '@fabriclab/config'
import type { LabHost, LabNode, LabTopology } from '@fabriclab/config'
import { getLogger } from '@fabriclab/telemetry'
import type { Logger } from '@fabriclab/telemetry'
import {
  SAVE_COMMANDS,
  addDefaultRoute,
  bgpConfigBatch,
  bgpSummary,
  enableDaemonFlag,
  interfaceIpAdd,
  interfaceStartup,
  linkUp,
  loopbackAdd,
  ping,
  removeDefaultRoute,
  restartService,
} from './commands.js'
import { CommandExecutor } from './executor.js'
import { attemptInOrder, filterUnknownCommand } from './fallback.js'
import { PHASES, silentReporter } from './reporter.js'
import type { LabReporter, ProbeResult, SessionSummary } from './reporter.js'
import { formatArgv } from './runtime/format.js'
import type { ContainerRuntime } from './runtime/types.js'

export type Sleep = (ms: number) => Promise<void>

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface LabSequencerOptions {
  topology: LabTopology
  runtime: ContainerRuntime
  reporter?: LabReporter
  /** Open-loop wait between phases. Tests pass a recorder that returns at once. */
  sleep?: Sleep
  logger?: Logger
}

export interface SaveOutcome {
  node: string
  applied: boolean
  via?: string
}

export interface VerificationReport {
  sessions: SessionSummary[]
  probes: ProbeResult[]
}

export interface LabRunReport extends VerificationReport {
  topology: string
  saved: SaveOutcome[]
}

export function allProbesPassed(report: VerificationReport): boolean {
  return report.probes.every((p) => p.success)
}

/**
 * Drives the lab from freshly started containers to a converged BGP
 * session, one command at a time.
 *
 * Every step reapplies configuration, so a second run over an already
 * configured lab ends in the same state. A non-zero exit at a step that
 * does not tolerate failure throws {@link CommandFailedError} and stops
 * the run where it is.
 */
export class LabSequencer {
  private readonly topology: LabTopology
  private readonly executor: CommandExecutor
  private readonly reporter: LabReporter
  private readonly sleep: Sleep
  private readonly logger: Logger

  constructor(options: LabSequencerOptions) {
    this.topology = options.topology
    this.logger = options.logger ?? getLogger('lab')
    this.executor = new CommandExecutor(options.runtime, this.logger.getChild('exec'))
    this.reporter = options.reporter ?? silentReporter
    this.sleep = options.sleep ?? defaultSleep
  }

  async run(): Promise<LabRunReport> {
    this.logger.info('Starting bring-up of {topology}', { topology: this.topology.name })
    const saved = await this.configure()
    const verification = await this.verify()
    return { topology: this.topology.name, saved, ...verification }
  }

  /** Phases 1 through 7: everything except verification. */
  async configure(): Promise<SaveOutcome[]> {
    await this.activateLinks()
    await this.repairHostRoutes()
    await this.configureInterfaces()
    await this.waitForStabilization()
    await this.enableRoutingDaemon()
    const saved = await this.configurePeering()
    await this.waitForConvergence()
    return saved
  }

  async activateLinks(): Promise<void> {
    this.reporter.phase(PHASES.links)
    for (const node of this.topology.nodes) {
      for (const iface of node.linkInterfaces) {
        await this.executor.run(node.container, linkUp(iface))
      }
    }
    await this.wait(this.topology.timing.linkSettleMs)
    this.reporter.done('All link interfaces are up')
  }

  /**
   * Replace the management-network default route the runtime installs with
   * one through the lab gateway. Neither step may stop the run: the old
   * route may already be gone and the new one may already exist.
   */
  async repairHostRoutes(): Promise<void> {
    this.reporter.phase(PHASES.hostRoutes)
    for (const host of this.topology.hosts) {
      await this.executor.tolerate(
        host.container,
        removeDefaultRoute(host.management.gateway, host.management.interface),
        'management default route absent'
      )
      await this.executor.tolerate(
        host.container,
        addDefaultRoute(host.gateway, host.interface),
        'lab default route present'
      )
    }
    this.reporter.done('Host routes configured')
  }

  async configureInterfaces(): Promise<void> {
    this.reporter.phase(PHASES.interfaces)
    for (const node of this.topology.nodes) {
      this.reporter.progress(`Configuring interfaces on ${node.name}...`)
      await this.configureNodeInterfaces(node)
      this.reporter.done(`Interfaces configured on ${node.name}`)
    }
  }

  private async configureNodeInterfaces(node: LabNode): Promise<void> {
    const { container, fabric, access, loopback } = node

    await this.executor.run(container, interfaceIpAdd(fabric.name, fabric.address))
    await this.executor.run(container, interfaceStartup(fabric.name))

    await this.executor.run(container, interfaceIpAdd(access.name, access.address))
    await this.executor.run(container, interfaceStartup(access.name))

    await this.executor.run(container, loopbackAdd(loopback.name))
    await this.executor.run(container, interfaceIpAdd(loopback.name, loopback.address))
    await this.executor.run(container, interfaceStartup(loopback.name))
  }

  async waitForStabilization(): Promise<void> {
    this.reporter.phase(PHASES.stabilize)
    await this.wait(this.topology.timing.stabilizeMs)
    this.reporter.done('Interfaces stabilized')
  }

  async enableRoutingDaemon(): Promise<void> {
    this.reporter.phase(PHASES.daemon)
    const { configFile, flag, service } = this.topology.daemon
    for (const node of this.topology.nodes) {
      this.reporter.progress(`Enabling ${flag} in ${node.container}...`)
      await this.executor.run(node.container, enableDaemonFlag(configFile, flag))
      await this.executor.run(node.container, restartService(service))
      // a service restart cannot be confirmed from outside the container
      await this.wait(this.topology.timing.daemonSettleMs)
    }
  }

  async configurePeering(): Promise<SaveOutcome[]> {
    this.reporter.phase(PHASES.peering)
    const saved: SaveOutcome[] = []
    for (const node of this.topology.nodes) {
      this.reporter.progress(`Configuring BGP on ${node.name} (AS ${node.asn})...`)
      await this.applyBgpBatch(node)
      saved.push(await this.saveConfig(node))
      this.reporter.done(`Successfully configured ${node.name}`)
    }
    return saved
  }

  private async applyBgpBatch(node: LabNode): Promise<void> {
    const argv = bgpConfigBatch({
      asn: node.asn,
      routerId: routerIdOf(node),
      neighbor: neighborOf(this.topology, node),
      network: advertisedNetwork(node),
    })
    const result = await this.executor.tolerate(node.container, argv, 'CLI dialect mismatch')
    for (const line of filterUnknownCommand([result.stdout, result.stderr].join('\n'))) {
      this.logger.info('{node} vtysh: {line}', { node: node.name, line })
    }
  }

  private async saveConfig(node: LabNode): Promise<SaveOutcome> {
    const outcome = await attemptInOrder(
      SAVE_COMMANDS.map((argv) => ({
        name: formatArgv(argv),
        run: () => this.executor.run(node.container, argv),
      }))
    )

    if (!outcome.applied) {
      this.logger.warn('Could not persist configuration on {node}', {
        node: node.name,
        failures: outcome.failures,
      })
      this.reporter.warn(`Configuration on ${node.name} was not saved; running state only`)
      return { node: node.name, applied: false }
    }
    return { node: node.name, applied: true, via: outcome.via }
  }

  async waitForConvergence(): Promise<void> {
    this.reporter.phase(PHASES.convergence)
    const { convergenceMs } = this.topology.timing
    this.reporter.progress(`Waiting ${Math.round(convergenceMs / 1000)} seconds...`)
    await this.wait(convergenceMs)
  }

  /**
   * Show each node's BGP summary and probe every host from every other
   * host once. Probe results are reported, never retried or enforced.
   */
  async verify(): Promise<VerificationReport> {
    this.reporter.phase(PHASES.verification)

    const sessions: SessionSummary[] = []
    for (const node of this.topology.nodes) {
      const result = await this.executor.run(node.container, bgpSummary())
      const summary = { node: node.name, container: node.container, output: result.stdout }
      sessions.push(summary)
      this.reporter.sessionSummary(summary)
    }

    const probes: ProbeResult[] = []
    for (const from of this.topology.hosts) {
      for (const to of this.topology.hosts) {
        if (to === from) continue
        const probe = await this.probe(from, to)
        probes.push(probe)
        this.reporter.probe(probe)
      }
    }

    return { sessions, probes }
  }

  private async probe(from: LabHost, to: LabHost): Promise<ProbeResult> {
    this.reporter.progress(`Testing ${from.name} -> ${to.name} (via ${to.address})...`)
    const result = await this.executor.tolerate(
      from.container,
      ping(to.address, this.topology.probeCount),
      'unreachable'
    )
    const success = result.exitCode === 0
    this.logger.info('Probe {from} -> {to}: {status}', {
      from: from.name,
      to: to.name,
      status: success ? 'success' : 'failed',
    })
    return { from: from.name, to: to.name, address: to.address, success, output: result.stdout }
  }

  private async wait(ms: number): Promise<void> {
    if (ms <= 0) return
    this.logger.debug('Sleeping {ms}ms', { ms })
    await this.sleep(ms)
  }
}

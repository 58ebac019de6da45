/**
 * argv builders for every command the sequencer sends into a container.
 *
 * Node containers run SONiC (`config ...`) with FRR (`vtysh`); host
 * containers are plain Linux (`ip`, `ping`).
 */

export type Argv = readonly string[]

// ---------------------------------------------------------------------------
// Link layer / host routing
// ---------------------------------------------------------------------------

export function linkUp(iface: string): Argv {
  return ['ip', 'link', 'set', iface, 'up']
}

export function removeDefaultRoute(gateway: string, iface: string): Argv {
  return ['ip', 'route', 'del', 'default', 'via', gateway, 'dev', iface]
}

export function addDefaultRoute(gateway: string, iface: string): Argv {
  return ['ip', 'route', 'add', 'default', 'via', gateway, 'dev', iface]
}

// ---------------------------------------------------------------------------
// SONiC interface configuration
// ---------------------------------------------------------------------------

export function interfaceIpAdd(iface: string, cidr: string): Argv {
  return ['config', 'interface', 'ip', 'add', iface, cidr]
}

export function interfaceStartup(iface: string): Argv {
  return ['config', 'interface', 'startup', iface]
}

export function loopbackAdd(name: string): Argv {
  return ['config', 'loopback', 'add', name]
}

// ---------------------------------------------------------------------------
// Routing daemon
// ---------------------------------------------------------------------------

/** Flip `<flag>=no` to `<flag>=yes` in the FRR daemons file. */
export function enableDaemonFlag(configFile: string, flag: string): Argv {
  return ['sed', '-i', `s/${flag}=no/${flag}=yes/`, configFile]
}

export function restartService(service: string): Argv {
  return ['service', service, 'restart']
}

// ---------------------------------------------------------------------------
// FRR vtysh
// ---------------------------------------------------------------------------

export function vtysh(...lines: string[]): Argv {
  return ['vtysh', ...lines.flatMap((line) => ['-c', line])]
}

export interface BgpBatch {
  asn: number
  routerId: string
  neighbor: { address: string; remoteAs: number }
  network: string
}

/** Lines of the single configuration transaction applied per node. */
export function bgpConfigLines(batch: BgpBatch): string[] {
  return [
    'configure terminal',
    `router bgp ${batch.asn}`,
    `bgp router-id ${batch.routerId}`,
    'bgp log-neighbor-changes',
    'no bgp ebgp-requires-policy',
    `neighbor ${batch.neighbor.address} remote-as ${batch.neighbor.remoteAs}`,
    'address-family ipv4 unicast',
    `network ${batch.network}`,
    'redistribute connected',
    'exit-address-family',
    'exit',
  ]
}

export function bgpConfigBatch(batch: BgpBatch): Argv {
  return vtysh(...bgpConfigLines(batch))
}

/** Persistence commands, primary first. Older FRR builds only know `write`. */
export const SAVE_COMMANDS: readonly Argv[] = [vtysh('write memory'), vtysh('write')]

export function bgpSummary(): Argv {
  return vtysh('show ip bgp summary')
}

export function ping(address: string, count: number): Argv {
  return ['ping', '-c', String(count), address]
}

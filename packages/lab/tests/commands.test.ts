import { describe, expect, it } from 'vitest'
import {
  SAVE_COMMANDS,
  addDefaultRoute,
  bgpConfigBatch,
  bgpConfigLines,
  bgpSummary,
  enableDaemonFlag,
  interfaceIpAdd,
  interfaceStartup,
  linkUp,
  loopbackAdd,
  ping,
  removeDefaultRoute,
  restartService,
  vtysh,
} from '../src/commands.js'

const batch = {
  asn: 65101,
  routerId: '9.9.9.1',
  neighbor: { address: '10.1.0.1', remoteAs: 65102 },
  network: '172.16.1.0/24',
}

describe('commands', () => {
  it('builds link and route commands', () => {
    expect(linkUp('eth1')).toEqual(['ip', 'link', 'set', 'eth1', 'up'])
    expect(removeDefaultRoute('172.20.20.1', 'eth0')).toEqual([
      'ip', 'route', 'del', 'default', 'via', '172.20.20.1', 'dev', 'eth0',
    ])
    expect(addDefaultRoute('172.16.1.1', 'eth1')).toEqual([
      'ip', 'route', 'add', 'default', 'via', '172.16.1.1', 'dev', 'eth1',
    ])
  })

  it('builds SONiC interface commands', () => {
    expect(interfaceIpAdd('Ethernet8', '10.1.0.0/31')).toEqual([
      'config', 'interface', 'ip', 'add', 'Ethernet8', '10.1.0.0/31',
    ])
    expect(interfaceStartup('Ethernet8')).toEqual(['config', 'interface', 'startup', 'Ethernet8'])
    expect(loopbackAdd('Loopback1')).toEqual(['config', 'loopback', 'add', 'Loopback1'])
  })

  it('builds the daemon enable and restart commands', () => {
    expect(enableDaemonFlag('/etc/frr/daemons', 'ospfd')).toEqual([
      'sed', '-i', 's/ospfd=no/ospfd=yes/', '/etc/frr/daemons',
    ])
    expect(restartService('frr')).toEqual(['service', 'frr', 'restart'])
  })

  it('passes each vtysh line as its own -c argument', () => {
    expect(vtysh('show version', 'show ip route')).toEqual([
      'vtysh', '-c', 'show version', '-c', 'show ip route',
    ])
    expect(bgpSummary()).toEqual(['vtysh', '-c', 'show ip bgp summary'])
  })

  it('orders the BGP batch as a single configuration transaction', () => {
    expect(bgpConfigLines(batch)).toEqual([
      'configure terminal',
      'router bgp 65101',
      'bgp router-id 9.9.9.1',
      'bgp log-neighbor-changes',
      'no bgp ebgp-requires-policy',
      'neighbor 10.1.0.1 remote-as 65102',
      'address-family ipv4 unicast',
      'network 172.16.1.0/24',
      'redistribute connected',
      'exit-address-family',
      'exit',
    ])
  })

  it('wraps the batch in one vtysh invocation', () => {
    const argv = bgpConfigBatch(batch)
    expect(argv[0]).toBe('vtysh')
    expect(argv.filter((a) => a === '-c')).toHaveLength(11)
    expect(argv[argv.length - 1]).toBe('exit')
  })

  it('tries write memory before write', () => {
    expect(SAVE_COMMANDS).toEqual([
      ['vtysh', '-c', 'write memory'],
      ['vtysh', '-c', 'write'],
    ])
  })

  it('builds a counted ping', () => {
    expect(ping('172.16.2.10', 5)).toEqual(['ping', '-c', '5', '172.16.2.10'])
  })
})

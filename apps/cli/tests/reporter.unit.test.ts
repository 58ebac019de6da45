import { parseTopology } from '@fabriclab/config'
import { Chalk } from 'chalk'
import { describe, expect, it } from 'vitest'
import { ConsoleReporter } from '../src/reporter.js'

const topology = parseTopology({
  name: 'pair',
  nodes: [
    {
      name: 'leaf-a',
      container: 'lab-leaf-a',
      asn: 65101,
      fabric: { name: 'Ethernet0', address: '10.1.0.0/31' },
      access: { name: 'Ethernet4', address: '172.16.1.1/24' },
      loopback: { name: 'Loopback0', address: '9.9.9.1/32' },
      peer: 'leaf-b',
    },
    {
      name: 'leaf-b',
      container: 'lab-leaf-b',
      asn: 65102,
      fabric: { name: 'Ethernet0', address: '10.1.0.1/31' },
      access: { name: 'Ethernet4', address: '172.16.2.1/24' },
      loopback: { name: 'Loopback0', address: '9.9.9.2/32' },
      peer: 'leaf-a',
    },
  ],
  hosts: [
    { name: 'pc-a', container: 'lab-pc-a', address: '172.16.1.10', gateway: '172.16.1.1' },
    { name: 'pc-b', container: 'lab-pc-b', address: '172.16.2.10', gateway: '172.16.2.1' },
  ],
})

function capture() {
  const lines: string[] = []
  const reporter = new ConsoleReporter({
    write: (line) => lines.push(line),
    colors: new Chalk({ level: 0 }),
  })
  return { lines, reporter }
}

describe('ConsoleReporter', () => {
  it('prints a numbered step banner underlined to its width', () => {
    const { lines, reporter } = capture()
    reporter.phase({ index: 4, title: 'Waiting for interfaces to stabilize' })

    expect(lines).toEqual([
      '',
      'Step 4: Waiting for interfaces to stabilize...',
      '----------------------------------------------',
    ])
  })

  it('marks completed and warned steps', () => {
    const { lines, reporter } = capture()
    reporter.done('Interfaces configured on leaf-a')
    reporter.warn('Configuration on leaf-b was not saved; running state only')

    expect(lines).toEqual([
      '✓ Interfaces configured on leaf-a',
      '! Configuration on leaf-b was not saved; running state only',
    ])
  })

  it('prints each BGP summary under its container name', () => {
    const { lines, reporter } = capture()
    reporter.sessionSummary({ node: 'leaf-a', container: 'lab-leaf-a', output: 'Neighbor  V  AS\n' })

    expect(lines).toEqual(['=== lab-leaf-a BGP Summary ===', 'Neighbor  V  AS', ''])
  })

  it('gives a verdict per probe direction', () => {
    const { lines, reporter } = capture()
    reporter.probe({ from: 'pc-a', to: 'pc-b', address: '172.16.2.10', success: true, output: '' })
    reporter.probe({
      from: 'pc-b',
      to: 'pc-a',
      address: '172.16.1.10',
      success: false,
      output: '3 packets transmitted, 0 received, 100% packet loss\n',
    })

    expect(lines).toEqual([
      '✓ pc-a -> pc-b SUCCESS',
      '3 packets transmitted, 0 received, 100% packet loss',
      '✗ pc-b -> pc-a FAILED',
    ])
  })

  it('opens with the topology name', () => {
    const { lines, reporter } = capture()
    reporter.header(topology)

    expect(lines[1]).toBe('Lab pair - Complete Configuration')
  })

  it('closes with inspection commands for the chosen runtime', () => {
    const { lines, reporter } = capture()
    reporter.footer(topology, 'podman')

    expect(lines.slice(-5)).toEqual([
      'Verification commands:',
      "  - Check BGP neighbors: podman exec <container> vtysh -c 'show ip bgp summary'",
      "  - Check BGP routes:    podman exec <container> vtysh -c 'show ip bgp'",
      "  - Check routing table: podman exec <container> vtysh -c 'show ip route'",
      '  - Test connectivity:   podman exec lab-pc-a ping 172.16.2.10',
    ])
  })
})

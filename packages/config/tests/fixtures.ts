/** Raw (unparsed) two-switch topology used across config tests. */
export function rawTopology() {
  return {
    name: 'test-lab',
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
  }
}

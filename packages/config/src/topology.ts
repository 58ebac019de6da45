import { z } from 'zod'
import { containsAddress, isCidr, isIpv4, isPointToPointPair, networkOf, parseCidr } from './ipv4.js'

const CidrSchema = z.string().refine(isCidr, 'Must be an IPv4 CIDR (a.b.c.d/n)')
const Ipv4Schema = z.string().refine(isIpv4, 'Must be an IPv4 address')

/**
 * A router interface as known to the switch CLI, e.g. `Ethernet0` with
 * `10.0.0.0/31`.
 */
export const InterfaceAssignmentSchema = z.object({
  name: z.string().min(1),
  address: CidrSchema,
})

export type InterfaceAssignment = z.infer<typeof InterfaceAssignmentSchema>

export const LabNodeSchema = z.object({
  name: z.string().min(1),
  container: z.string().min(1),
  asn: z.number().int().min(1).max(4_294_967_295),
  /** Emulated links that come up in the link-activation phase. */
  linkInterfaces: z.array(z.string().min(1)).default(['eth1', 'eth2']),
  /** Inter-node point-to-point link. */
  fabric: InterfaceAssignmentSchema,
  /** Host-facing link; its subnet is the network the node advertises. */
  access: InterfaceAssignmentSchema,
  /** Loopback address doubles as the BGP router-id. */
  loopback: InterfaceAssignmentSchema,
  peer: z.string().min(1),
})

export type LabNode = z.infer<typeof LabNodeSchema>

export const LabHostSchema = z.object({
  name: z.string().min(1),
  container: z.string().min(1),
  address: Ipv4Schema,
  interface: z.string().min(1).default('eth1'),
  gateway: Ipv4Schema,
  /** Default route the container runtime installs on the management network. */
  management: z
    .object({
      gateway: Ipv4Schema.default('172.20.20.1'),
      interface: z.string().min(1).default('eth0'),
    })
    .default({}),
})

export type LabHost = z.infer<typeof LabHostSchema>

export const LabTimingSchema = z.object({
  linkSettleMs: z.number().int().nonnegative().default(2_000),
  stabilizeMs: z.number().int().nonnegative().default(5_000),
  daemonSettleMs: z.number().int().nonnegative().default(3_000),
  convergenceMs: z.number().int().nonnegative().default(30_000),
})

export type LabTiming = z.infer<typeof LabTimingSchema>

export const RoutingDaemonSchema = z.object({
  configFile: z.string().min(1).default('/etc/frr/daemons'),
  flag: z.string().regex(/^[a-z0-9]+$/, 'Daemon flag must be a bare daemon name').default('bgpd'),
  service: z.string().min(1).default('frr'),
})

export type RoutingDaemon = z.infer<typeof RoutingDaemonSchema>

function duplicates(values: string[]): string[] {
  const seen = new Set<string>()
  const dupes = new Set<string>()
  for (const value of values) {
    if (seen.has(value)) dupes.add(value)
    seen.add(value)
  }
  return [...dupes]
}

export const LabTopologySchema = z
  .object({
    name: z.string().min(1),
    nodes: z.array(LabNodeSchema).min(2),
    /** Every host probes every other host, so a lab needs at least two. */
    hosts: z.array(LabHostSchema).min(2),
    timing: LabTimingSchema.default({}),
    daemon: RoutingDaemonSchema.default({}),
    probeCount: z.number().int().min(1).default(3),
  })
  .superRefine((topology, ctx) => {
    // field-level issues are already reported; cross-checks need parseable addresses
    const addressable =
      topology.nodes.every((n) => [n.fabric, n.access, n.loopback].every((i) => isCidr(i.address))) &&
      topology.hosts.every((h) => isIpv4(h.address) && isIpv4(h.gateway))
    if (!addressable) return

    for (const name of duplicates(topology.nodes.map((n) => n.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['nodes'], message: `Duplicate node name: ${name}` })
    }
    for (const name of duplicates(topology.hosts.map((h) => h.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['hosts'], message: `Duplicate host name: ${name}` })
    }
    for (const address of duplicates(topology.hosts.map((h) => h.address))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['hosts'], message: `Duplicate host address: ${address}` })
    }
    const containers = [...topology.nodes, ...topology.hosts].map((m) => m.container)
    for (const container of duplicates(containers)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate container name: ${container}` })
    }

    const byName = new Map(topology.nodes.map((n) => [n.name, n]))

    topology.nodes.forEach((node, index) => {
      const path = ['nodes', index]
      const peer = byName.get(node.peer)
      if (!peer || peer === node) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'peer'],
          message: `Node ${node.name} must peer with another node, got '${node.peer}'`,
        })
        return
      }
      if (peer.peer !== node.name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'peer'],
          message: `Peering between ${node.name} and ${peer.name} is not mutual`,
        })
      }
      if (!isPointToPointPair(node.fabric.address, peer.fabric.address)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'fabric', 'address'],
          message: `${node.fabric.address} and ${peer.fabric.address} are not a /31 point-to-point pair`,
        })
      }
      if (parseCidr(node.loopback.address).prefix !== 32) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'loopback', 'address'],
          message: `Loopback ${node.loopback.address} must be a /32`,
        })
      }
    })

    const routerIds = topology.nodes.map((n) => parseCidr(n.loopback.address).address)
    for (const id of duplicates(routerIds)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['nodes'], message: `Duplicate loopback (router-id): ${id}` })
    }

    topology.hosts.forEach((host, index) => {
      if (host.address === host.gateway) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hosts', index, 'address'],
          message: `Address ${host.address} of ${host.name} is its own gateway`,
        })
        return
      }
      const subnet = topology.nodes
        .map((n) => n.access.address)
        .find((cidr) => containsAddress(cidr, host.gateway))
      if (!subnet) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hosts', index, 'gateway'],
          message: `Gateway ${host.gateway} of ${host.name} is not on any node's access subnet`,
        })
      } else if (!containsAddress(subnet, host.address)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hosts', index, 'address'],
          message: `Address ${host.address} of ${host.name} is outside ${networkOf(subnet)}`,
        })
      }
    })
  })

/** Validated, immutable description of the lab. */
export type LabTopology = Readonly<z.infer<typeof LabTopologySchema>>

export function parseTopology(raw: unknown): LabTopology {
  return LabTopologySchema.parse(raw)
}

export interface Neighbor {
  address: string
  remoteAs: number
}

export function peerOf(topology: LabTopology, node: LabNode): LabNode {
  const peer = topology.nodes.find((n) => n.name === node.peer)
  if (!peer) {
    throw new Error(`Node ${node.name} has no peer named ${node.peer}`)
  }
  return peer
}

export function neighborOf(topology: LabTopology, node: LabNode): Neighbor {
  const peer = peerOf(topology, node)
  return { address: parseCidr(peer.fabric.address).address, remoteAs: peer.asn }
}

export function routerIdOf(node: LabNode): string {
  return parseCidr(node.loopback.address).address
}

export function advertisedNetwork(node: LabNode): string {
  return networkOf(node.access.address)
}

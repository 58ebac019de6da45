/**
 * Minimal IPv4 / CIDR helpers used to validate and derive lab addressing.
 *
 * Addresses are handled as unsigned 32-bit integers internally.
 */

export interface Cidr {
  address: string
  prefix: number
}

const OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/

export function isIpv4(value: string): boolean {
  const parts = value.split('.')
  return parts.length === 4 && parts.every((p) => OCTET.test(p))
}

export function ipToInt(address: string): number {
  if (!isIpv4(address)) {
    throw new Error(`Invalid IPv4 address: ${address}`)
  }
  return address.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0)
}

export function intToIp(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.')
}

export function isCidr(value: string): boolean {
  const parts = value.split('/')
  if (parts.length !== 2) return false
  const [address, prefix] = parts
  if (!/^\d{1,2}$/.test(prefix) || Number(prefix) > 32) return false
  return isIpv4(address)
}

/**
 * Parse `a.b.c.d/n`. The host part is preserved, so `192.168.1.1/24`
 * keeps `192.168.1.1` as its address.
 */
export function parseCidr(value: string): Cidr {
  if (!isCidr(value)) {
    throw new Error(`Invalid CIDR: ${value}`)
  }
  const [address, prefix] = value.split('/')
  return { address, prefix: Number(prefix) }
}

export function formatCidr(cidr: Cidr): string {
  return `${cidr.address}/${cidr.prefix}`
}

function maskOf(prefix: number): number {
  return prefix === 0 ? 0 : 2 ** 32 - 2 ** (32 - prefix)
}

/** Network address of a CIDR, e.g. `192.168.1.1/24` -> `192.168.1.0/24`. */
export function networkOf(value: string): string {
  const { address, prefix } = parseCidr(value)
  const mask = maskOf(prefix)
  // bitwise ops are signed in JS, >>> 0 brings the result back to unsigned
  const network = (ipToInt(address) & mask) >>> 0
  return formatCidr({ address: intToIp(network), prefix })
}

export function containsAddress(cidr: string, address: string): boolean {
  const { prefix } = parseCidr(cidr)
  return networkOf(cidr) === networkOf(`${address}/${prefix}`)
}

/** Both ends of a /31 link: same network, different addresses. */
export function isPointToPointPair(a: string, b: string): boolean {
  const left = parseCidr(a)
  const right = parseCidr(b)
  if (left.prefix !== 31 || right.prefix !== 31) return false
  if (left.address === right.address) return false
  return networkOf(a) === networkOf(b)
}

import { isIP } from 'node:net'
import ipaddr from 'ipaddr.js'

/**
 * Canonical string form of an IP address, or null when the input is not an
 * IP literal. IPv6 addresses use RFC 5952 compression; an IPv4-mapped IPv6
 * address keeps its IPv6 form and is not folded into the IPv4 address. A
 * zone id is kept verbatim after the compressed address.
 */
export function canonicalAddress(address: string): string | null {
  const family = isIP(address)
  if (family === 0) return null
  if (family === 4) return address

  // Zone ids may hold characters ipaddr.js rejects (eth0.100, br-1a2b)
  const zoneStart = address.indexOf('%')
  const base = zoneStart < 0 ? address : address.slice(0, zoneStart)
  const zone = zoneStart < 0 ? '' : address.slice(zoneStart)
  if (!ipaddr.IPv6.isValid(base)) return null
  return ipaddr.IPv6.parse(base).toRFC5952String() + zone
}

function isAddress(address: string | null | undefined): address is string {
  return typeof address === 'string' && canonicalAddress(address) !== null
}

/**
 * Deduplicate addresses by canonical form, keeping first-seen order.
 * Index 0 of the result is the preferred address for connection attempts.
 */
export function dedupeAddresses(
  addresses: ReadonlyArray<string | null | undefined>,
): readonly string[] {
  if (addresses.length < 2 && addresses.every(isAddress)) {
    return addresses
  }

  const seen = new Set<string>()
  const out: string[] = []
  for (const address of addresses) {
    if (!address) continue
    const key = canonicalAddress(address)
    if (key === null || seen.has(key)) continue
    seen.add(key)
    out.push(address)
  }
  return out
}

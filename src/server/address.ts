import { isIPv4, isIPv6 } from 'node:net'
import type { Protocol } from '../config'

export class InvalidAddressError extends Error {
  constructor(
    public readonly address: string,
    reason: string
  ) {
    super(`address ${address}: ${reason}`)
    this.name = 'InvalidAddressError'
  }
}

export interface ListenTarget {
  host: string
  port: number
  ipv6Only: boolean
}

/**
 * Split `host:port`, `:port` or `[ipv6]:port` into its parts. The host is
 * empty when only a port is given.
 */
export function splitHostPort(address: string): { host: string; port: number } {
  const separator = address.lastIndexOf(':')
  if (separator === -1) {
    throw new InvalidAddressError(address, 'missing port in address')
  }

  let host = address.slice(0, separator)
  const portText = address.slice(separator + 1)

  if (host.startsWith('[')) {
    if (!host.endsWith(']')) {
      throw new InvalidAddressError(address, "missing ']' in address")
    }
    host = host.slice(1, -1)
  } else if (host.includes(':')) {
    throw new InvalidAddressError(address, 'too many colons in address')
  }

  if (!/^\d+$/.test(portText) || Number(portText) > 65535) {
    throw new InvalidAddressError(address, `invalid port "${portText}"`)
  }

  return { host, port: Number(portText) }
}

/**
 * Work out what to listen on for a protocol family and bind address.
 * An empty host means all interfaces of the family: `0.0.0.0` for tcp4,
 * `::` for tcp6 (IPv6 only) and `::` dual-stack for tcp.
 */
export function resolveListenTarget(
  protocol: Protocol,
  address: string
): ListenTarget {
  const { host, port } = splitHostPort(address)

  if (protocol === 'tcp4' && isIPv6(host)) {
    throw new InvalidAddressError(address, 'not an IPv4 address')
  }
  if (protocol === 'tcp6' && isIPv4(host)) {
    throw new InvalidAddressError(address, 'not an IPv6 address')
  }

  if (host === '') {
    return {
      host: protocol === 'tcp4' ? '0.0.0.0' : '::',
      port,
      ipv6Only: protocol === 'tcp6'
    }
  }
  return { host, port, ipv6Only: protocol === 'tcp6' }
}

/**
 * Format a bound address the way it is accepted, bracketing IPv6 hosts.
 */
export function joinHostPort(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`
}

import type { ListenAddress } from '@root/types/config.types.js'

/**
 * Parses `host:port`. IPv6 hosts are bracketed: `[::1]:3000`.
 *
 * @throws Error when the address or port is malformed
 */
export function parseListenAddr(value: string): ListenAddress {
  const trimmed = value.trim()
  const match = trimmed.startsWith('[')
    ? /^\[([^\]]+)\]:(\d+)$/.exec(trimmed)
    : /^([^:]+):(\d+)$/.exec(trimmed)

  if (!match) {
    throw new Error(
      `Invalid listen address "${value}": expected host:port or [ipv6]:port`,
    )
  }

  const port = Number.parseInt(match[2], 10)
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid listen port ${match[2]}: must be 1-65535`)
  }

  return { host: match[1], port }
}

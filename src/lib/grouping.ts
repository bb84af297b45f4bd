/**
 * Grouping Resolver
 *
 * Maps a service identifier to the group path its entry is placed under.
 * Pure: the same (service, strategy) always yields an equal path.
 */

import type { GroupPath, GroupingStrategy } from '../types.js'

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/

/**
 * Extract the host part of a URL-ish service string.
 * Drops scheme, userinfo, path/query/fragment, port and a trailing dot.
 */
export function extractHost(service: string): string {
  let rest = service.trim().replace(SCHEME_PATTERN, '')

  const pathStart = rest.search(/[/?#]/)
  if (pathStart !== -1) {
    rest = rest.slice(0, pathStart)
  }

  const at = rest.lastIndexOf('@')
  if (at !== -1) {
    rest = rest.slice(at + 1)
  }

  rest = rest.replace(/:\d*$/, '')
  return rest.replace(/\.$/, '').toLowerCase()
}

/**
 * Reduce a service to its domain group name
 *
 * @example
 * domainGroupName('https://api.example.com/login') // 'example.com'
 * domainGroupName('example.com')                   // 'example.com'
 * domainGroupName('localhost')                     // 'localhost'
 * domainGroupName('https://localhost/login')       // 'localhost'
 * domainGroupName('My App')                        // 'My App'
 */
export function domainGroupName(service: string): string {
  const host = extractHost(service)

  // Dotless: bare names stay as they are, URLs keep their host
  if (!host.includes('.')) {
    return host === '' || host === service.trim().toLowerCase() ? service : host
  }

  if (IPV4_PATTERN.test(host)) {
    return host
  }

  const labels = host.split('.')
  if (labels.length > 2) {
    return labels.slice(-2).join('.')
  }
  return host
}

/**
 * Compute the group path for a service under a strategy
 */
export function resolveGroupPath(service: string, strategy: GroupingStrategy): GroupPath {
  switch (strategy) {
    case 'flat':
      return Object.freeze([])
    case 'service':
      return Object.freeze([service])
    case 'domain':
      return Object.freeze([domainGroupName(service)])
    default: {
      const unknown: never = strategy
      throw new Error(`Unknown grouping strategy: ${String(unknown)}`)
    }
  }
}

/**
 * Canonical string key of a group path, equal paths give equal keys
 */
export function groupPathKey(path: GroupPath): string {
  return JSON.stringify(path)
}

/**
 * Display form of a group path ("/" for root)
 */
export function formatGroupPath(path: GroupPath): string {
  return path.length === 0 ? '/' : path.join(' / ')
}

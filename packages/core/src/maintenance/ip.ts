/**
 * IP allow-list matching
 */

import net, { BlockList } from 'node:net';

const MAPPED_IPV4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;
const MAPPED_IPV4_HEX = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i;

/**
 * `::ffff:7f00:1` → `127.0.0.1`; null for anything else
 */
function mappedHexToIPv4(ip: string): string | null {
  const match = MAPPED_IPV4_HEX.exec(ip);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  const high = Number.parseInt(match[1], 16);
  const low = Number.parseInt(match[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

/**
 * Canonical form used for comparisons: `localhost` becomes 127.0.0.1, mapped
 * IPv4 addresses (dotted or hex) lose their prefix, IPv6 is compressed and
 * lower-cased. Values that are not addresses come back trimmed and lower-cased.
 */
export function normalizeIp(raw: string): string {
  let ip = raw.trim().toLowerCase();
  if (ip.startsWith('[') && ip.endsWith(']')) {
    ip = ip.slice(1, -1);
  }
  const zone = ip.indexOf('%');
  if (zone !== -1) {
    ip = ip.slice(0, zone);
  }

  if (ip === 'localhost') {
    return '127.0.0.1';
  }

  const mapped = MAPPED_IPV4.exec(ip);
  if (mapped?.[1] && net.isIPv4(mapped[1])) {
    return mapped[1];
  }

  if (net.isIPv6(ip)) {
    // The WHATWG URL parser prints IPv6 hosts in compressed form
    const host = new URL(`http://[${ip}]/`).hostname;
    const compressed = host.slice(1, -1);
    return MAPPED_IPV4.exec(compressed)?.[1] ?? mappedHexToIPv4(compressed) ?? compressed;
  }

  return ip;
}

export function isLoopback(ip: string): boolean {
  const normalized = normalizeIp(ip);
  return normalized === '::1' || (net.isIPv4(normalized) && normalized.startsWith('127.'));
}

/**
 * Whether `entry` is a CIDR range (`10.0.0.0/8`, `fd00::/8`)
 */
function parseCidr(entry: string): { network: string; prefix: number; family: 'ipv4' | 'ipv6' } | null {
  const [address, bits, extra] = entry.split('/');
  if (address === undefined || bits === undefined || extra !== undefined || !/^\d{1,3}$/.test(bits)) {
    return null;
  }
  const network = normalizeIp(address);
  const prefix = Number.parseInt(bits, 10);
  if (net.isIPv4(network) && prefix <= 32) {
    return { network, prefix, family: 'ipv4' };
  }
  if (net.isIPv6(network) && prefix <= 128) {
    return { network, prefix, family: 'ipv6' };
  }
  return null;
}

/**
 * Whether `entry` is something the allow-list can hold
 */
export function isValidWhitelistEntry(entry: string): boolean {
  const normalized = normalizeIp(entry);
  return net.isIP(normalized) !== 0 || parseCidr(entry.trim()) !== null;
}

/**
 * Pure allow-list check. Loopback is always allowed.
 */
export function isIpAllowed(ip: string, whitelist: readonly string[]): boolean {
  const client = normalizeIp(ip);
  if (isLoopback(client)) {
    return true;
  }

  const family = net.isIPv4(client) ? 'ipv4' : net.isIPv6(client) ? 'ipv6' : null;

  for (const entry of whitelist) {
    const trimmed = entry.trim();
    if (normalizeIp(trimmed) === client) {
      return true;
    }
    const range = parseCidr(trimmed);
    if (range && family === range.family) {
      const list = new BlockList();
      list.addSubnet(range.network, range.prefix, range.family);
      if (list.check(client, family)) {
        return true;
      }
    }
  }
  return false;
}

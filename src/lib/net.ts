/**
 * IPv4 address and CIDR helpers.
 */

import { isIPv4 } from 'node:net';

export interface Ipv4Range {
  start: number;
  end: number;
}

export function ipv4ToNumber(address: string): number | undefined {
  if (!isIPv4(address)) return undefined;
  return address.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

export function parseCidr(cidr: string): Ipv4Range | undefined {
  const [address, prefixText, ...rest] = cidr.split('/');
  if (address === undefined || prefixText === undefined || rest.length > 0) return undefined;
  if (!/^\d{1,2}$/.test(prefixText)) return undefined;
  const prefix = Number(prefixText);
  const base = ipv4ToNumber(address);
  if (base === undefined || prefix > 32) return undefined;
  const size = 2 ** (32 - prefix);
  const start = Math.floor(base / size) * size;
  return { start, end: start + size - 1 };
}

export function rangesOverlap(a: Ipv4Range, b: Ipv4Range): boolean {
  return a.start <= b.end && b.start <= a.end;
}

/**
 * Accepts a single address, a CIDR, or a `start-end` range with start <= end.
 */
export function parseAddressPoolEntry(entry: string): Ipv4Range | undefined {
  if (entry.includes('/')) return parseCidr(entry);
  if (entry.includes('-')) {
    const [from, to, ...rest] = entry.split('-').map((part) => part.trim());
    if (from === undefined || to === undefined || rest.length > 0) return undefined;
    const start = ipv4ToNumber(from);
    const end = ipv4ToNumber(to);
    if (start === undefined || end === undefined || start > end) return undefined;
    return { start, end };
  }
  const single = ipv4ToNumber(entry);
  return single === undefined ? undefined : { start: single, end: single };
}

export { isIPv4 };

// src/services/retrieval/url-guard.ts — only public http(s) URLs are fetched
import { BlockList, isIP } from 'net';

const blocked = new BlockList();
// private
blocked.addSubnet('10.0.0.0', 8, 'ipv4');
blocked.addSubnet('172.16.0.0', 12, 'ipv4');
blocked.addSubnet('192.168.0.0', 16, 'ipv4');
blocked.addSubnet('0.0.0.0', 8, 'ipv4');
blocked.addSubnet('100.64.0.0', 10, 'ipv4');
blocked.addSubnet('fc00::', 7, 'ipv6');
// loopback
blocked.addSubnet('127.0.0.0', 8, 'ipv4');
blocked.addAddress('::1', 'ipv6');
blocked.addAddress('::', 'ipv6');
// link-local
blocked.addSubnet('169.254.0.0', 16, 'ipv4');
blocked.addSubnet('fe80::', 10, 'ipv6');

const MAPPED_V4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

export function isBlockedAddress(host: string): boolean {
  const mapped = MAPPED_V4.exec(host);
  if (mapped) return blocked.check(mapped[1], 'ipv4');
  const family = isIP(host);
  if (family === 4) return blocked.check(host, 'ipv4');
  if (family === 6) return blocked.check(host, 'ipv6');
  return false;
}

/**
 * http/https with a host that is not `localhost` and, when it is an IP
 * literal, not private, loopback or link-local. Hostnames are not resolved.
 */
export function isPublicHttpUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
  const host = parsed.hostname.trim().toLowerCase().replace(/^\[(.*)\]$/, '$1');
  if (!host) return false;
  if (host === 'localhost') return false;
  return !isBlockedAddress(host);
}

export function domainOf(url: string): string {
  try {
    return new URL(url).hostname.trim().toLowerCase();
  } catch {
    return '';
  }
}

import { BlockList, isIP } from 'node:net';
import { MalformedRangeError } from './errors';

export type HeaderMap = Record<string, string | string[] | undefined>;

/** Request fields read from Express or raw Node `IncomingMessage` objects. */
export interface RequestLike {
  headers?: HeaderMap;
  socket?: { remoteAddress?: string; remotePort?: number };
  connection?: { remoteAddress?: string; remotePort?: number };
  originalUrl?: string;
  url?: string;
}

/** Read-only per-request view used by the decision engine. */
export interface RequestContext {
  headers: HeaderMap;
  /** Socket peer as `host:port`, IPv6 hosts in brackets. */
  remoteAddr: string;
  /** Request target as received (path and query string). */
  uri: string;
}

/** Parsed `address/prefix` network range. */
export interface CidrRange {
  source: string;
  network: string;
  prefix: number;
  family: 4 | 6;
}

export const REAL_IP_HEADER = 'x-real-ip';
export const FORWARDED_FOR_HEADER = 'x-forwarded-for';

export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  if (!key) {
    return undefined;
  }
  const value = headers[key];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

export function toRequestContext(req: RequestLike): RequestContext {
  return {
    headers: req.headers ?? {},
    remoteAddr: extractRemoteAddr(req),
    uri: extractUri(req),
  };
}

export function extractUri(req: RequestLike): string {
  return req.originalUrl ?? req.url ?? '/';
}

/**
 * Returns the effective client address.
 * `X-Forwarded-For` (first hop) wins over `X-Real-Ip`; with neither header the socket peer is used.
 */
export function resolveClientAddress(ctx: RequestContext): string {
  const realIp = getHeader(ctx.headers, REAL_IP_HEADER) ?? '';
  const forwardedFor = getHeader(ctx.headers, FORWARDED_FOR_HEADER) ?? '';

  if (!realIp && !forwardedFor) {
    return stripPort(ctx.remoteAddr);
  }

  if (forwardedFor) {
    const [first] = forwardedFor.split(',').map((part) => part.trim());
    return first ?? '';
  }

  return realIp;
}

/** Drops a trailing `:port` (everything after the last colon) and unwraps `[v6]` hosts. */
export function stripPort(address: string): string {
  if (address.startsWith('[')) {
    const bracketEnd = address.indexOf(']');
    if (bracketEnd > 0) {
      return address.slice(1, bracketEnd);
    }
  }

  const idx = address.lastIndexOf(':');
  if (idx === -1) {
    return address;
  }
  return address.slice(0, idx);
}

export function stripIpv6Prefix(ip: string): string {
  if (ip.toLowerCase().startsWith('::ffff:') && isIP(ip.slice(7)) === 4) {
    return ip.slice(7);
  }
  return ip;
}

/** Parses `address/prefix`. A bare address is rejected. */
export function parseCidr(source: string): CidrRange {
  const slash = source.indexOf('/');
  if (slash === -1) {
    throw new MalformedRangeError(source, 'missing prefix length');
  }

  const network = source.slice(0, slash);
  const family = ipFamily(network);
  if (!family || network.includes('%')) {
    throw new MalformedRangeError(source, 'invalid network address');
  }

  const bits = source.slice(slash + 1);
  if (!/^\d{1,3}$/.test(bits)) {
    throw new MalformedRangeError(source, 'invalid prefix length');
  }

  const prefix = Number(bits);
  if (prefix > (family === 4 ? 32 : 128)) {
    throw new MalformedRangeError(source, 'prefix length out of range');
  }

  return { source, network, prefix, family };
}

/**
 * Tests membership. An address that is not an IP, is of the other family, or carries an IPv6
 * zone index (`fe80::1%eth0`) is never contained.
 */
export function cidrContains(range: CidrRange, address: string): boolean {
  const candidate = stripIpv6Prefix(address);
  if (candidate.includes('%') || isIP(candidate) !== range.family) {
    return false;
  }

  const type = range.family === 6 ? 'ipv6' : 'ipv4';
  const blockList = new BlockList();
  blockList.addSubnet(range.network, range.prefix, type);
  return blockList.check(candidate, type);
}

function ipFamily(value: string): 4 | 6 | undefined {
  const family = isIP(value);
  if (family === 4 || family === 6) {
    return family;
  }
  return undefined;
}

function extractRemoteAddr(req: RequestLike): string {
  const socket = req.socket?.remoteAddress ? req.socket : req.connection;
  if (!socket?.remoteAddress) {
    return '';
  }

  const host = socket.remoteAddress;
  const hostPart = isIP(host) === 6 ? `[${host}]` : host;
  if (typeof socket.remotePort === 'number') {
    return `${hostPart}:${socket.remotePort}`;
  }
  return hostPart;
}

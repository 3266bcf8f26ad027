import type { IncomingHttpHeaders } from 'http';
import { HEADERS, SESSION_COOKIE } from './constants.js';
import { AuthError } from './errors.js';
import { DESKTOP_IDENTITY, type DeviceRegistry } from './device-registry.js';
import type { SessionStore } from './session-store.js';
import { normalizeIp } from './utils/network.js';
import type { Requester } from './types.js';

/**
 * The parts of an HTTP request or WebSocket handshake that decide who is asking
 */
export interface RequestInfo {
  ip: string | undefined;
  headers: IncomingHttpHeaders;
  query: URLSearchParams;
}

export function parseCookies(header: string | undefined): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!header) return cookies;

  for (const part of header.split(';')) {
    const index = part.indexOf('=');
    if (index === -1) continue;
    const name = part.slice(0, index).trim();
    if (!name) continue;
    const value = part.slice(index + 1).trim();
    try {
      cookies.set(name, decodeURIComponent(value));
    } catch {
      cookies.set(name, value);
    }
  }
  return cookies;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Decides whether a request comes from the desktop itself or from a paired
 * phone, and who that phone is
 */
export class Gatekeeper {
  private trustedIps: Set<string>;
  private sessions: SessionStore;
  private devices: DeviceRegistry;

  constructor(trustedIps: Iterable<string>, sessions: SessionStore, devices: DeviceRegistry) {
    this.trustedIps = new Set([...trustedIps].map(normalizeIp).filter(Boolean));
    this.sessions = sessions;
    this.devices = devices;
  }

  isTrusted(ip: string | undefined): boolean {
    const normalized = normalizeIp(ip);
    return normalized !== '' && this.trustedIps.has(normalized);
  }

  // Header first, then (handshake only) the query string, then the cookie
  readSessionId(info: RequestInfo, allowQuery: boolean = false): string | undefined {
    return headerValue(info.headers, HEADERS.SESSION_ID)
      || (allowQuery ? info.query.get('session_id') ?? undefined : undefined)
      || parseCookies(headerValue(info.headers, 'cookie')).get(SESSION_COOKIE);
  }

  hasValidSession(info: RequestInfo, allowQuery: boolean = false): boolean {
    return this.sessions.validate(this.readSessionId(info, allowQuery), normalizeIp(info.ip)) !== null;
  }

  /**
   * Authorize the request and attribute it to a device
   */
  authenticate(info: RequestInfo, allowQuery: boolean = false): Requester {
    if (this.isTrusted(info.ip)) {
      return { ...DESKTOP_IDENTITY, isDesktop: true };
    }

    if (!this.hasValidSession(info, allowQuery)) {
      throw new AuthError('Unauthenticated');
    }

    const declaredId = headerValue(info.headers, HEADERS.DEVICE_ID)
      || (allowQuery ? info.query.get('device_id') ?? undefined : undefined);
    const declaredName = headerValue(info.headers, HEADERS.DEVICE_NAME)
      || (allowQuery ? info.query.get('device_name') ?? undefined : undefined);

    const identity = this.devices.resolve(false, declaredId, declaredName ? decodeHeader(declaredName) : undefined);
    return { ...identity, isDesktop: false };
  }

  requireDesktop(info: RequestInfo): Requester {
    if (!this.isTrusted(info.ip)) {
      throw new AuthError('DesktopOnly');
    }
    return { ...DESKTOP_IDENTITY, isDesktop: true };
  }
}

// Browsers can only send Latin-1 headers, so names arrive percent-encoded
function decodeHeader(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

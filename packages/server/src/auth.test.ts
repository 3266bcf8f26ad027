import type { IncomingHttpHeaders } from 'http';
import { Gatekeeper, parseCookies, type RequestInfo } from './auth.js';
import { DeviceRegistry } from './device-registry.js';
import { AuthError } from './errors.js';
import { TokenIssuer } from './pairing.js';
import { SessionStore } from './session-store.js';
import { createTransferContext } from './types.js';

function info(ip: string, headers: IncomingHttpHeaders = {}, query: string = ''): RequestInfo {
  return { ip, headers, query: new URLSearchParams(query) };
}

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof AuthError ? error.reason : 'unexpected error';
  }
  return undefined;
}

describe('parseCookies', () => {
  it('should split and decode cookies', () => {
    const cookies = parseCookies('a=1; lft_session=abc%20def; broken; =x');
    expect([...cookies.entries()]).toEqual([
      ['a', '1'],
      ['lft_session', 'abc def'],
    ]);
  });

  it('should handle a missing header', () => {
    expect(parseCookies(undefined).size).toBe(0);
  });
});

describe('Gatekeeper', () => {
  let gatekeeper: Gatekeeper;
  let sessionId: string;

  beforeEach(() => {
    const context = createTransferContext();
    const tokens = new TokenIssuer(context, 120);
    const sessions = new SessionStore(context, 3600);
    gatekeeper = new Gatekeeper(['127.0.0.1', '::1', '192.168.1.5'], sessions, new DeviceRegistry(context));

    const result = sessions.exchange(tokens.issue().token, '192.168.1.20');
    if (!result.success) throw new Error('exchange failed');
    sessionId = result.sessionId;
  });

  it('should trust loopback and the LAN address, including mapped IPv4', () => {
    expect(gatekeeper.isTrusted('127.0.0.1')).toBe(true);
    expect(gatekeeper.isTrusted('::ffff:192.168.1.5')).toBe(true);
    expect(gatekeeper.isTrusted('192.168.1.20')).toBe(false);
    expect(gatekeeper.isTrusted(undefined)).toBe(false);
  });

  it('should treat trusted callers as the desktop', () => {
    expect(gatekeeper.authenticate(info('::1'))).toEqual({ deviceId: 'desktop', deviceName: 'Desktop', isDesktop: true });
  });

  it('should read the session from the header, then the cookie', () => {
    expect(gatekeeper.readSessionId(info('x', { 'x-session-id': 'h', cookie: 'lft_session=c' }))).toBe('h');
    expect(gatekeeper.readSessionId(info('x', { cookie: 'lft_session=c' }))).toBe('c');
  });

  it('should only read the query string during a handshake', () => {
    const request = info('x', {}, 'session_id=q');
    expect(gatekeeper.readSessionId(request)).toBeUndefined();
    expect(gatekeeper.readSessionId(request, true)).toBe('q');
  });

  it('should attribute a phone by its declared identity', () => {
    const requester = gatekeeper.authenticate(info('192.168.1.20', {
      'x-session-id': sessionId,
      'x-device-id': 'phone-1',
      'x-device-name': 'Bob%E2%80%99s%20phone',
    }));

    expect(requester).toEqual({ deviceId: 'phone-1', deviceName: 'Bob’s phone', isDesktop: false });
  });

  it('should take the identity from the query during a handshake', () => {
    const requester = gatekeeper.authenticate(
      info('::ffff:192.168.1.20', {}, `session_id=${sessionId}&device_id=phone-2&device_name=Tab`),
      true
    );
    expect(requester).toEqual({ deviceId: 'phone-2', deviceName: 'Tab', isDesktop: false });
  });

  it('should refuse a session used from another address', () => {
    expect(reasonOf(() => gatekeeper.authenticate(info('192.168.1.21', {
      'x-session-id': sessionId,
      'x-device-id': 'phone-1',
    })))).toBe('Unauthenticated');
  });

  it('should refuse phones on desktop-only operations', () => {
    expect(reasonOf(() => gatekeeper.requireDesktop(info('192.168.1.20')))).toBe('DesktopOnly');
    expect(gatekeeper.requireDesktop(info('127.0.0.1')).isDesktop).toBe(true);
  });
});

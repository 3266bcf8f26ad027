import { v4 as uuidv4 } from 'uuid';
import { AuthError } from './errors.js';
import { LOG_TAGS } from './constants.js';
import { logger } from './utils/logger.js';
import type { Session, TransferContext } from './types.js';

const TAG = LOG_TAGS.PAIRING;

export type ExchangeResult =
  | { success: true; sessionId: string; reused: boolean }
  | { success: false; error: AuthError };

/**
 * Turns the pairing token into IP-bound sessions. Expiry is checked lazily on
 * every lookup and exchange; there is no background sweep.
 */
export class SessionStore {
  private context: TransferContext;
  private ttlMs: number;

  constructor(context: TransferContext, ttlSeconds: number) {
    this.context = context;
    this.ttlMs = ttlSeconds * 1000;
  }

  get ttlSeconds(): number {
    return this.ttlMs / 1000;
  }

  exchange(token: string, ip: string, currentSessionId?: string | null): ExchangeResult {
    if (!token) {
      return { success: false, error: new AuthError('TokenMissing') };
    }
    if (!ip) {
      return { success: false, error: new AuthError('OriginUnknown') };
    }

    // Scanning the same code again from a device that is already paired keeps its session
    const existing = this.validate(currentSessionId, ip);
    if (existing) {
      return { success: true, sessionId: existing.id, reused: true };
    }

    const now = this.context.now();
    this.sweep(now);

    const slot = this.context.token;
    if (slot.value !== token) {
      return { success: false, error: new AuthError('TokenInvalid') };
    }
    if (slot.consumed) {
      return { success: false, error: new AuthError('TokenConsumed') };
    }
    if (slot.expiresAt <= now) {
      return { success: false, error: new AuthError('TokenExpired') };
    }

    slot.consumed = true;
    const session: Session = {
      id: uuidv4().replace(/-/g, ''),
      boundIp: ip,
      createdAt: now,
      lastSeenAt: now,
    };
    this.context.sessions.set(session.id, session);
    logger.info(TAG, `Session established for ${ip}`);

    return { success: true, sessionId: session.id, reused: false };
  }

  // A session is only valid from its bound IP and within TTL of its last use
  validate(sessionId: string | null | undefined, ip: string | null | undefined): Session | null {
    if (!sessionId) {
      return null;
    }

    const now = this.context.now();
    this.sweep(now);

    const session = this.context.sessions.get(sessionId);
    if (!session || session.boundIp !== ip) {
      return null;
    }

    session.lastSeenAt = now;
    return session;
  }

  purge(sessionId: string): boolean {
    const removed = this.context.sessions.delete(sessionId);
    if (removed) {
      logger.info(TAG, `Session ${sessionId.slice(0, 8)} purged`);
    }
    return removed;
  }

  count(): number {
    return this.context.sessions.size;
  }

  private sweep(now: number): void {
    for (const [id, session] of this.context.sessions.entries()) {
      if (now - session.lastSeenAt > this.ttlMs) {
        this.context.sessions.delete(id);
      }
    }
  }
}

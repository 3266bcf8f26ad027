import { randomInt } from 'crypto';
import { LOG_TAGS, TOKEN_ALPHABET, TOKEN_LENGTH } from './constants.js';
import { logger } from './utils/logger.js';
import type { TransferContext } from './types.js';

const TAG = LOG_TAGS.PAIRING;

// Generate a random one-time token from an alphabet without look-alike characters
export function generateToken(length: number = TOKEN_LENGTH): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += TOKEN_ALPHABET.charAt(randomInt(TOKEN_ALPHABET.length));
  }
  return token;
}

export interface IssuedToken {
  token: string;
  expiresAt: number;
}

/**
 * Holds the single process-wide pairing token
 */
export class TokenIssuer {
  private context: TransferContext;
  private ttlMs: number;

  constructor(context: TransferContext, ttlSeconds: number) {
    this.context = context;
    this.ttlMs = ttlSeconds * 1000;
  }

  // Reuse the current token while it is still exchangeable, unless a new one is forced
  issue(forceNew: boolean = false): IssuedToken {
    const now = this.context.now();
    const current = this.context.token;

    if (!forceNew && current.value && !current.consumed && current.expiresAt > now) {
      return { token: current.value, expiresAt: current.expiresAt };
    }

    this.context.token = {
      value: generateToken(),
      expiresAt: now + this.ttlMs,
      consumed: false,
    };
    logger.debug(TAG, `Issued new pairing token, expires in ${this.ttlMs / 1000}s`);

    return { token: this.context.token.value, expiresAt: this.context.token.expiresAt };
  }
}

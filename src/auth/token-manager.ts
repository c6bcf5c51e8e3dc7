/**
 * Access token lifecycle
 *
 * E*TRADE access tokens expire at midnight US Eastern time no matter how
 * they are used, and go inactive after two hours without a request. A
 * token past midnight needs the interactive handshake again; an idle one
 * only needs a renewal call.
 */

import type { Config } from '../config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { createLogger, fingerprint } from '../logging.js';
import { isSameEasternDay, EASTERN_TIME_ZONE } from './eastern-time.js';
import { CredentialsMissingError } from './errors.js';
import { EtradeOAuth } from './oauth.js';
import type { TokenPair } from './oauth1.js';

const log = createLogger('token-manager');

export type TokenState = 'NO_CREDENTIALS' | 'VALID' | 'EXPIRED_DAILY' | 'NEEDS_RENEWAL';

export interface TokenManagerOptions {
  /** Idle time after which the token is renewed (default: 90) */
  idleRenewalMinutes?: number;
  /** Zone whose midnight ends a token's life (default: America/New_York) */
  timeZone?: string;
}

export class TokenManager {
  private store: CredentialStore;
  private etradeConfig: Config['etrade'];
  private idleRenewalMs: number;
  private timeZone: string;
  private lastUsed: Date | null = null;

  constructor(store: CredentialStore, etradeConfig: Config['etrade'], options: TokenManagerOptions = {}) {
    this.store = store;
    this.etradeConfig = etradeConfig;
    this.idleRenewalMs = (options.idleRenewalMinutes ?? 90) * 60 * 1000;
    this.timeZone = options.timeZone ?? EASTERN_TIME_ZONE;
  }

  /**
   * Classify the stored token without touching the network
   */
  async inspect(now: Date = new Date()): Promise<TokenState> {
    const { key, secret } = await this.store.getConsumerCredentials();
    const stored = await this.store.getAccessToken();
    if (!key || !secret || !stored) {
      return 'NO_CREDENTIALS';
    }
    if (!isSameEasternDay(stored.issuedAt, now, this.timeZone)) {
      return 'EXPIRED_DAILY';
    }
    return this.isIdle(stored.issuedAt, now) ? 'NEEDS_RENEWAL' : 'VALID';
  }

  /**
   * Return the stored token pair, renewing it first if it has been idle
   * past the renewal window.
   *
   * @throws CredentialsMissingError when credentials or token are missing
   *   or the token has crossed midnight Eastern (the expired token is
   *   deleted)
   * @throws RenewalFailedError when the renewal call fails
   */
  async ensureActive(): Promise<TokenPair> {
    const { key, secret } = await this.store.getConsumerCredentials();
    const stored = await this.store.getAccessToken();
    if (!key || !secret || !stored) {
      throw new CredentialsMissingError('Missing E*TRADE consumer credentials or access token.');
    }

    const now = new Date();
    if (!isSameEasternDay(stored.issuedAt, now, this.timeZone)) {
      await this.store.clearAccessToken();
      this.lastUsed = null;
      throw new CredentialsMissingError('E*TRADE access token expired at midnight Eastern.');
    }

    const pair: TokenPair = { token: stored.token, tokenSecret: stored.tokenSecret };

    if (this.isIdle(stored.issuedAt, now)) {
      log.info(`Token ${fingerprint(pair.token)} idle past ${this.idleRenewalMs / 60000} minutes, renewing`);
      const oauth = new EtradeOAuth(this.etradeConfig, { key, secret });
      await oauth.renewAccessToken(pair);
      await this.store.touchIssuedAt(now.toISOString());
    }

    this.lastUsed = now;
    return pair;
  }

  /**
   * Forget the in-process activity record
   */
  reset(): void {
    this.lastUsed = null;
  }

  private isIdle(issuedAt: Date, now: Date): boolean {
    const anchor = this.lastUsed ?? issuedAt;
    return now.getTime() - anchor.getTime() > this.idleRenewalMs;
  }
}

/**
 * Signed HTTP transport bound to an access token
 */

import { OAuth1Signer, type TokenPair } from '../auth/oauth1.js';
import type { ConsumerCredential } from '../credentials/types.js';
import { fingerprint } from '../logging.js';
import type { AuthenticatedSession, ResolvedAccount, SignedRequestOptions } from './types.js';

export class EtradeSession implements AuthenticatedSession {
  readonly tokenFingerprint: string;
  private signer: OAuth1Signer;
  private token: TokenPair;
  private userAgent: string;
  private resolvedAccount: ResolvedAccount | null = null;

  constructor(consumer: ConsumerCredential, token: TokenPair, userAgent: string) {
    this.signer = new OAuth1Signer(consumer);
    this.token = token;
    this.userAgent = userAgent;
    this.tokenFingerprint = fingerprint(token.token);
  }

  get account(): ResolvedAccount | null {
    return this.resolvedAccount;
  }

  /** True when this handle is bound to the given token pair */
  isBoundTo(token: TokenPair): boolean {
    return this.token.token === token.token && this.token.tokenSecret === token.tokenSecret;
  }

  attachAccount(account: ResolvedAccount | null): void {
    this.resolvedAccount = account;
  }

  async request(method: string, url: string, options: SignedRequestOptions = {}): Promise<Response> {
    const target = new URL(url);
    if (options.params) {
      Object.entries(options.params).forEach(([key, value]) => {
        if (value !== undefined) {
          target.searchParams.set(key, String(value));
        }
      });
    }

    const headers: Record<string, string> = {
      'Authorization': this.signer.authorize(method, target.toString(), this.token),
      'User-Agent': this.userAgent,
      'Accept': 'application/json',
      ...options.headers,
    };

    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    return fetch(target.toString(), init);
  }
}

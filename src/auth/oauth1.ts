/**
 * OAuth 1.0a request signing (HMAC-SHA1)
 */

import { createHmac } from 'node:crypto';
import OAuth from 'oauth-1.0a';
import type { ConsumerCredential } from '../credentials/types.js';

export interface TokenPair {
  token: string;
  tokenSecret: string;
}

export type OAuthProtocolParams = Partial<Record<'oauth_callback' | 'oauth_verifier', string>>;

export class OAuth1Signer {
  private oauth: OAuth;

  constructor(consumer: ConsumerCredential) {
    this.oauth = new OAuth({
      consumer: { key: consumer.key, secret: consumer.secret },
      signature_method: 'HMAC-SHA1',
      hash_function(baseString, key) {
        return createHmac('sha1', key).update(baseString).digest('base64');
      },
    });
  }

  /**
   * Build the Authorization header for a request. Query parameters in
   * `url` and any protocol params are part of the signature base string.
   */
  authorize(method: string, url: string, token?: TokenPair, protocolParams: OAuthProtocolParams = {}): string {
    const signed = this.oauth.authorize(
      { url, method, data: { ...protocolParams } },
      token ? { key: token.token, secret: token.tokenSecret } : undefined
    );
    return this.oauth.toHeader({ ...signed, ...protocolParams }).Authorization;
  }
}

/**
 * Parse a form-encoded token endpoint response
 */
export function parseTokenResponse(body: string): TokenPair {
  const params = new URLSearchParams(body.trim());
  const token = params.get('oauth_token');
  const tokenSecret = params.get('oauth_token_secret');
  if (!token || !tokenSecret) {
    throw new Error('Token response is missing oauth_token or oauth_token_secret');
  }
  return { token, tokenSecret };
}

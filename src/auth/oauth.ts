/**
 * E*TRADE OAuth 1.0a endpoints
 */

import type { Config } from '../config.js';
import type { ConsumerCredential } from '../credentials/types.js';
import { HandshakeFailedError, RenewalFailedError, type HandshakeStep } from './errors.js';
import { OAuth1Signer, parseTokenResponse, type OAuthProtocolParams, type TokenPair } from './oauth1.js';

export class EtradeOAuth {
  private config: Config['etrade'];
  private consumer: ConsumerCredential;
  private signer: OAuth1Signer;

  constructor(config: Config['etrade'], consumer: ConsumerCredential) {
    this.config = config;
    this.consumer = consumer;
    this.signer = new OAuth1Signer(consumer);
  }

  /**
   * Obtain a temporary request token (first leg)
   */
  async getRequestToken(): Promise<TokenPair> {
    const url = `${this.config.oauthBaseUrl}/oauth/request_token`;
    const body = await this.call('request-token', url, undefined, { oauth_callback: this.config.callback });
    return this.parse('request-token', body);
  }

  /**
   * Page the user visits to approve access and obtain a verifier code
   */
  getAuthorizationUrl(requestToken: TokenPair): string {
    const params = new URLSearchParams({
      key: this.consumer.key,
      token: requestToken.token,
    });
    return `${this.config.authorizeUrl}?${params.toString()}`;
  }

  /**
   * Exchange an authorized request token and verifier for an access token
   */
  async exchangeVerifier(requestToken: TokenPair, verifier: string): Promise<TokenPair> {
    const url = `${this.config.oauthBaseUrl}/oauth/access_token`;
    const body = await this.call('access-token', url, requestToken, { oauth_verifier: verifier });
    return this.parse('access-token', body);
  }

  /**
   * Extend an idle access token's validity window. The token itself is
   * not rotated.
   */
  async renewAccessToken(accessToken: TokenPair): Promise<void> {
    const url = `${this.config.oauthBaseUrl}/oauth/renew_access_token`;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.headers(this.signer.authorize('GET', url, accessToken)),
      });
    } catch (error) {
      throw new RenewalFailedError(`Token renewal request failed: ${describe(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new RenewalFailedError(`Failed to renew token: ${response.status} - ${detail}`, response.status);
    }
  }

  /**
   * Invalidate an access token at the provider
   */
  async revokeAccessToken(accessToken: TokenPair): Promise<void> {
    const url = `${this.config.oauthBaseUrl}/oauth/revoke_access_token`;
    const response = await fetch(url, {
      headers: this.headers(this.signer.authorize('GET', url, accessToken)),
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`Failed to revoke token: ${response.status} - ${detail}`);
    }
  }

  private async call(
    step: HandshakeStep,
    url: string,
    token: TokenPair | undefined,
    protocolParams: OAuthProtocolParams
  ): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.headers(this.signer.authorize('GET', url, token, protocolParams)),
      });
    } catch (error) {
      throw new HandshakeFailedError(`${step} request failed: ${describe(error)}`, step, undefined, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new HandshakeFailedError(`Failed to obtain ${step}: ${response.status} - ${detail}`, step, response.status);
    }

    return response.text();
  }

  private parse(step: HandshakeStep, body: string): TokenPair {
    try {
      return parseTokenResponse(body);
    } catch (error) {
      throw new HandshakeFailedError(`Malformed ${step} response: ${describe(error)}`, step, undefined, { cause: error });
    }
  }

  private headers(authorization: string): Record<string, string> {
    return {
      'Authorization': authorization,
      'User-Agent': this.config.userAgent,
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

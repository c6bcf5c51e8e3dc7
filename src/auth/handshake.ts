/**
 * Three-legged OAuth 1.0a handshake
 *
 * request token -> user authorization (verifier) -> access token, then
 * account lookup and persistence of the new token. Nothing is stored
 * unless the access token exchange succeeds.
 */

import type { Config } from '../config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { createLogger, fingerprint } from '../logging.js';
import { EtradeSession } from '../session/etrade-session.js';
import type { ResolvedAccount } from '../session/types.js';
import type { AccountResolver } from './account-resolver.js';
import { CredentialsMissingError } from './errors.js';
import { EtradeOAuth } from './oauth.js';
import type { TokenPair } from './oauth1.js';
import type { VerifierSource } from './verifier.js';

const log = createLogger('oauth');

export type HandshakeResult =
  | { status: 'authenticated'; session: EtradeSession; token: TokenPair; issuedAt: Date; account: ResolvedAccount | null }
  | { status: 'cancelled' };

export class OAuthSessionController {
  private store: CredentialStore;
  private etradeConfig: Config['etrade'];
  private verifierSource: VerifierSource;
  private accountResolver: AccountResolver;

  constructor(
    store: CredentialStore,
    etradeConfig: Config['etrade'],
    verifierSource: VerifierSource,
    accountResolver: AccountResolver
  ) {
    this.store = store;
    this.etradeConfig = etradeConfig;
    this.verifierSource = verifierSource;
    this.accountResolver = accountResolver;
  }

  /**
   * Run the full interactive flow.
   *
   * @throws CredentialsMissingError before any network call when consumer
   *   credentials are not configured
   * @throws HandshakeFailedError when a token endpoint fails
   */
  async run(signal?: AbortSignal): Promise<HandshakeResult> {
    const { key, secret } = await this.store.getConsumerCredentials();
    if (!key || !secret) {
      throw new CredentialsMissingError('E*TRADE consumer key and secret are not configured.');
    }
    const consumer = { key, secret };
    const oauth = new EtradeOAuth(this.etradeConfig, consumer);

    const requestToken = await oauth.getRequestToken();
    log.info('Request token obtained');

    const authorizationUrl = oauth.getAuthorizationUrl(requestToken);
    log.info(`Waiting for user authorization: ${authorizationUrl}`);
    const verifier = (await this.verifierSource.requestVerifier(authorizationUrl, signal))?.trim();
    if (!verifier) {
      log.info('Authorization cancelled by user');
      return { status: 'cancelled' };
    }

    const token = await oauth.exchangeVerifier(requestToken, verifier);
    const issuedAt = new Date();
    log.info(`Access token ${fingerprint(token.token)} obtained`);

    const session = new EtradeSession(consumer, token, this.etradeConfig.userAgent);
    const account = await this.accountResolver.resolve(session);
    session.attachAccount(account);

    await this.store.setAccessToken(token.token, token.tokenSecret, issuedAt.toISOString());

    return { status: 'authenticated', session, token, issuedAt, account };
  }
}

/**
 * Session facade
 *
 * The one place the rest of the server obtains an authenticated E*TRADE
 * session. `getSession()` has a documented side effect: when no usable
 * token is stored (none saved, expired at midnight Eastern, or the idle
 * renewal failed) it runs the interactive OAuth handshake and waits for
 * the user's verifier before returning.
 */

import type { AccountResolver } from '../auth/account-resolver.js';
import {
  CredentialsMissingError,
  HandshakeFailedError,
  NotAuthenticatedError,
  RenewalFailedError,
} from '../auth/errors.js';
import type { HandshakeResult, OAuthSessionController } from '../auth/handshake.js';
import { EtradeOAuth } from '../auth/oauth.js';
import type { TokenPair } from '../auth/oauth1.js';
import type { TokenManager } from '../auth/token-manager.js';
import type { Config } from '../config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { createLogger } from '../logging.js';
import { EtradeSession } from './etrade-session.js';
import type { ResolvedAccount, SessionStatus } from './types.js';

const log = createLogger('session');

/** Anything that can report an authorization URL awaiting a verifier */
export interface AuthorizationPrompt {
  pending(): string | null;
}

export interface SessionFacadeDeps {
  store: CredentialStore;
  etradeConfig: Config['etrade'];
  tokenManager: TokenManager;
  handshake: OAuthSessionController;
  accountResolver: AccountResolver;
  prompt?: AuthorizationPrompt;
}

export class SessionFacade {
  private deps: SessionFacadeDeps;
  private current: EtradeSession | null = null;
  /** undefined until resolved; null when the provider listed no account */
  private account: ResolvedAccount | null | undefined = undefined;
  private inflight: Promise<EtradeSession> | null = null;

  constructor(deps: SessionFacadeDeps) {
    this.deps = deps;
  }

  /**
   * Return a session bound to a currently valid access token, renewing or
   * re-authorizing as needed. Concurrent callers share one acquisition, so
   * at most one interactive handshake runs at a time.
   *
   * The first caller's signal cancels the shared acquisition. A later
   * caller's signal only stops that caller waiting for it.
   *
   * @throws NotAuthenticatedError when the user cancels, the consumer
   *   credentials are missing, or the handshake fails
   */
  getSession(signal?: AbortSignal): Promise<EtradeSession> {
    if (!this.inflight) {
      this.inflight = this.acquire(signal).finally(() => {
        this.inflight = null;
      });
      return this.inflight;
    }
    return signal ? untilAborted(this.inflight, signal) : this.inflight;
  }

  /** Account id of the default account, once resolved */
  get accountId(): string | null {
    return this.account?.accountId ?? null;
  }

  get resolvedAccount(): ResolvedAccount | null {
    return this.account ?? null;
  }

  /**
   * Current token state and pending authorization, without network calls
   */
  async status(): Promise<SessionStatus> {
    const authorizationUrl = this.deps.prompt?.pending() ?? null;
    return {
      state: await this.deps.tokenManager.inspect(),
      accountId: this.accountId,
      authorizationPending: authorizationUrl !== null,
      authorizationUrl,
      backend: this.deps.store.backendName,
    };
  }

  /**
   * Revoke (best effort) and forget the stored access token
   */
  async logout(): Promise<void> {
    const { key, secret } = await this.deps.store.getConsumerCredentials();
    const stored = await this.deps.store.getAccessToken();
    if (key && secret && stored) {
      const oauth = new EtradeOAuth(this.deps.etradeConfig, { key, secret });
      try {
        await oauth.revokeAccessToken({ token: stored.token, tokenSecret: stored.tokenSecret });
      } catch (error) {
        log.warn(`Token revocation failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    await this.deps.store.clearAccessToken();
    this.deps.tokenManager.reset();
    this.current = null;
    this.account = undefined;
    log.info('Logged out of E*TRADE');
  }

  private async acquire(signal?: AbortSignal): Promise<EtradeSession> {
    const stored = await this.deps.store.getAccessToken();
    if (stored) {
      try {
        const pair = await this.deps.tokenManager.ensureActive();
        return await this.bind(pair);
      } catch (error) {
        if (!(error instanceof CredentialsMissingError || error instanceof RenewalFailedError)) {
          throw error;
        }
        log.warn(`${error.message} Starting interactive authorization.`);
        this.current = null;
      }
    }

    return this.authenticate(signal);
  }

  private async authenticate(signal?: AbortSignal): Promise<EtradeSession> {
    let result: HandshakeResult;
    try {
      result = await this.deps.handshake.run(signal);
    } catch (error) {
      if (error instanceof CredentialsMissingError) {
        throw new NotAuthenticatedError(error.message, 'credentials-missing', { cause: error });
      }
      if (error instanceof HandshakeFailedError) {
        throw new NotAuthenticatedError(`E*TRADE authorization failed: ${error.message}`, 'handshake-failed', {
          cause: error,
        });
      }
      throw error;
    }

    if (result.status === 'cancelled') {
      throw new NotAuthenticatedError('E*TRADE authorization was cancelled.', 'cancelled');
    }

    this.deps.tokenManager.reset();
    this.current = result.session;
    this.account = result.account;
    return result.session;
  }

  private async bind(pair: TokenPair): Promise<EtradeSession> {
    if (this.current?.isBoundTo(pair)) {
      return this.current;
    }

    const { key, secret } = await this.deps.store.getConsumerCredentials();
    if (!key || !secret) {
      throw new CredentialsMissingError('E*TRADE consumer key and secret are not configured.');
    }

    const session = new EtradeSession({ key, secret }, pair, this.deps.etradeConfig.userAgent);
    if (this.account === undefined) {
      this.account = await this.deps.accountResolver.resolve(session);
    }
    session.attachAccount(this.account);
    this.current = session;
    return session;
  }
}

function untilAborted<T>(shared: Promise<T>, signal: AbortSignal): Promise<T> {
  const stopped = (): NotAuthenticatedError =>
    new NotAuthenticatedError('Stopped waiting for the E*TRADE session.', 'cancelled');
  if (signal.aborted) {
    return Promise.reject(stopped());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(stopped());
    signal.addEventListener('abort', onAbort, { once: true });
    void shared.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

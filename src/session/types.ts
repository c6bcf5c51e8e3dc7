/**
 * Session types for the E*TRADE MCP Server
 */

import type { TokenState } from '../auth/token-manager.js';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface SignedRequestOptions {
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

/** Brokerage account selected for the session */
export interface ResolvedAccount {
  /** Display account number */
  accountId: string;
  /** Opaque key used in account-scoped API paths */
  accountIdKey: string;
  description?: string;
}

/**
 * Authenticated transport handle bound to one access token pair
 */
export interface AuthenticatedSession {
  /** Short label of the bound token, safe to log */
  readonly tokenFingerprint: string;
  /** Account resolved for this process, if any */
  readonly account: ResolvedAccount | null;
  /** Send a request signed with the consumer credentials and access token */
  request(method: string, url: string, options?: SignedRequestOptions): Promise<Response>;
}

export interface SessionStatus {
  state: TokenState;
  accountId: string | null;
  authorizationPending: boolean;
  authorizationUrl: string | null;
  backend: string;
}

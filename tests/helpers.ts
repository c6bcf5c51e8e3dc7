import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi, type Mock } from 'vitest';
import type { Config } from '../src/config.js';
import { CredentialStore } from '../src/credentials/credential-store.js';
import { MemorySecretBackend } from '../src/credentials/memory-backend.js';

export const etradeConfig: Config['etrade'] = {
  sandbox: true,
  apiBaseUrl: 'https://apisb.etrade.com',
  oauthBaseUrl: 'https://api.etrade.com',
  authorizeUrl: 'https://us.etrade.com/e/t/etws/authorize',
  callback: 'oob',
  userAgent: 'EtradeMCP/test',
};

export type FetchMock = Mock<typeof fetch>;

export function stubFetch(): FetchMock {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

export function jsonResponse(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** URLs passed to fetch, in call order */
export function fetchedUrls(fetchMock: FetchMock): string[] {
  return fetchMock.mock.calls.map(([input]) => (typeof input === 'string' ? input : String(input)));
}

export function authorizationHeader(fetchMock: FetchMock, call: number): string | null {
  return new Headers(fetchMock.mock.calls[call]?.[1]?.headers).get('Authorization');
}

export const accountListBody = {
  AccountListResponse: {
    Accounts: {
      Account: [
        { accountId: 12345678, accountIdKey: 'key-1', accountDesc: 'Brokerage', accountName: 'Main' },
        { accountId: '87654321', accountIdKey: 'key-2' },
      ],
    },
  },
};

/**
 * Route fetches by endpoint; every call gets a fresh Response
 */
export function serveEtrade(fetchMock: FetchMock, overrides: Record<string, () => Response> = {}): void {
  const routes: Record<string, () => Response> = {
    '/oauth/request_token': () => textResponse('oauth_token=req-token&oauth_token_secret=req-secret'),
    '/oauth/access_token': () => textResponse('oauth_token=new-token&oauth_token_secret=new-secret'),
    '/oauth/renew_access_token': () => textResponse('Access Token has been renewed'),
    '/oauth/revoke_access_token': () => textResponse('Revoked Access Token'),
    '/v1/accounts/list.json': () => jsonResponse(accountListBody),
    ...overrides,
  };
  fetchMock.mockImplementation(async (input) => {
    const { pathname } = new URL(typeof input === 'string' ? input : String(input));
    const route = routes[pathname];
    return route ? route() : textResponse('not found', 404);
  });
}

export interface StoreFixture {
  backend: MemorySecretBackend;
  store: CredentialStore;
}

/**
 * Memory-backed store isolated from the process environment
 */
export async function createStore(
  options: { consumer?: boolean; token?: { issued: string; token?: string; secret?: string } } = {}
): Promise<StoreFixture> {
  const backend = new MemorySecretBackend();
  const store = new CredentialStore(backend, { env: {} });
  if (options.consumer ?? true) {
    await store.setConsumerCredentials('test-key', 'test-secret');
  }
  if (options.token) {
    await store.setAccessToken(
      options.token.token ?? 'stored-token',
      options.token.secret ?? 'stored-secret',
      options.token.issued
    );
  }
  return { backend, store };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'etrade-mcp-'));
}

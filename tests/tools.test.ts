import fs from 'node:fs/promises';
import path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LRUCache } from 'lru-cache';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AccountResolver } from '../src/auth/account-resolver.js';
import { OAuthSessionController } from '../src/auth/handshake.js';
import { TokenManager } from '../src/auth/token-manager.js';
import { PendingVerifierSource } from '../src/auth/verifier.js';
import type { CredentialStore } from '../src/credentials/credential-store.js';
import { EtradeClient } from '../src/etrade/client.js';
import type { OrderPreview } from '../src/etrade/types.js';
import { PortfolioStore } from '../src/portfolio/portfolio-store.js';
import { Simulator } from '../src/portfolio/simulator.js';
import { UserConfigStore } from '../src/portfolio/user-config.js';
import { RecommendationService } from '../src/recommendations/service.js';
import { SessionFacade } from '../src/session/session-facade.js';
import { registerTools } from '../src/tools/index.js';
import { createStore, etradeConfig, jsonResponse, makeTempDir, serveEtrade, stubFetch, textResponse, type FetchMock } from './helpers.js';

type ToolResult = Awaited<ReturnType<Client['callTool']>>;

function textOf(result: ToolResult): string {
  const content: unknown = result.content;
  if (!Array.isArray(content)) return '';
  const first: unknown = content[0];
  return first !== null && typeof first === 'object' && 'text' in first && typeof first.text === 'string' ? first.text : '';
}

const quoteBody = {
  QuoteResponse: { QuoteData: [{ Product: { symbol: 'AAPL' }, All: { lastTrade: 190 } }] },
};

describe('MCP tools', () => {
  let dir: string;
  let fetchMock: FetchMock;
  let store: CredentialStore;
  let verifier: PendingVerifierSource;
  let portfolio: PortfolioStore;
  let client: Client;
  let server: McpServer;

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
    return client.callTool({ name, arguments: args });
  }

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-02T15:00:00Z'));
    fetchMock = stubFetch();
    serveEtrade(fetchMock, { '/v1/market/quote/AAPL.json': () => jsonResponse(quoteBody) });

    dir = await makeTempDir();
    ({ store } = await createStore());
    verifier = new PendingVerifierSource();
    const accountResolver = new AccountResolver(etradeConfig.apiBaseUrl);
    const facade = new SessionFacade({
      store,
      etradeConfig,
      tokenManager: new TokenManager(store, etradeConfig),
      handshake: new OAuthSessionController(store, etradeConfig, verifier, accountResolver),
      accountResolver,
      prompt: verifier,
    });
    const etrade = new EtradeClient(facade, etradeConfig.apiBaseUrl);
    portfolio = await PortfolioStore.load(path.join(dir, 'portfolio.json'));
    const userConfig = await UserConfigStore.load(path.join(dir, 'user_config.json'));
    const engine = { description: 'fake', generate: async () => '{"riskLevel":"Low","suggestedAction":"HOLD"}' };

    server = new McpServer({ name: 'etrade-mcp-test', version: '0.0.0' });
    registerTools(server, {
      facade,
      verifier,
      store,
      client: etrade,
      portfolio,
      simulator: new Simulator(portfolio),
      userConfig,
      recommendations: new RecommendationService(etrade, engine, userConfig),
      previews: new LRUCache<string, OrderPreview>({ max: 10 }),
    });

    client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await fs.rm(dir, { recursive: true, force: true });
    vi.useRealTimers();
  });

  it('lists every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'etrade_auth_status',
      'etrade_cancel_login',
      'etrade_get_quote',
      'etrade_get_recommendation',
      'etrade_login',
      'etrade_logout',
      'etrade_place_order',
      'etrade_preview_order',
      'etrade_set_consumer_credentials',
      'etrade_submit_verifier',
      'portfolio_get',
      'portfolio_reconcile',
      'portfolio_simulate_trade',
      'settings_get_risk_profile',
      'settings_set_risk_profile',
    ]);
  });

  it('asks for login instead of blocking a data tool', async () => {
    const result = await call('etrade_get_quote', { symbol: 'AAPL' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Not logged in to E*TRADE. Call etrade_login to authorize.');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('logs in with a verifier and then serves quotes', async () => {
    const login = await call('etrade_login');
    expect(textOf(login)).toContain('https://us.etrade.com/e/t/etws/authorize?key=test-key&token=req-token');

    const pendingQuote = await call('etrade_get_quote', { symbol: 'AAPL' });
    expect(textOf(pendingQuote)).toContain('E*TRADE authorization is pending.');

    const submitted = await call('etrade_submit_verifier', { verifier: 'VER123' });
    expect(textOf(submitted)).toBe('Authenticated with E*TRADE, account 12345678 (Brokerage).');

    const quote = await call('etrade_get_quote', { symbol: 'aapl' });
    expect(quote.isError).toBeFalsy();
    expect(JSON.parse(textOf(quote))).toMatchObject({ symbol: 'AAPL', lastPrice: 190 });

    const status = await call('etrade_auth_status');
    expect(JSON.parse(textOf(status))).toMatchObject({
      state: 'VALID',
      accountId: '12345678',
      authorizationPending: false,
      consumerCredentialsConfigured: true,
    });
  });

  it('renews an idle token before serving a quote', async () => {
    await store.setAccessToken('stored-token', 'stored-secret', '2026-03-02T13:20:00.000Z');

    const quote = await call('etrade_get_quote', { symbol: 'AAPL' });

    expect(quote.isError).toBeFalsy();
    expect(JSON.parse(textOf(quote))).toMatchObject({ symbol: 'AAPL', lastPrice: 190 });
    expect((await store.getAccessToken())?.issuedAt).toEqual(new Date('2026-03-02T15:00:00Z'));
  });

  it('returns the authorization URL when the idle renewal fails', async () => {
    serveEtrade(fetchMock, {
      '/oauth/renew_access_token': () => textResponse('oauth_problem=token_rejected', 401),
      '/v1/market/quote/AAPL.json': () => jsonResponse(quoteBody),
    });
    await store.setAccessToken('stored-token', 'stored-secret', '2026-03-02T13:20:00.000Z');

    const blocked = await call('etrade_get_quote', { symbol: 'AAPL' });

    expect(blocked.isError).toBe(true);
    expect(textOf(blocked)).toBe(
      'The stored E*TRADE token could not be renewed. Open this URL and authorize the application:\n\n' +
        'https://us.etrade.com/e/t/etws/authorize?key=test-key&token=req-token\n\n' +
        'Then call etrade_submit_verifier with the verification code shown by E*TRADE.'
    );
    expect(verifier.pending()).toBe('https://us.etrade.com/e/t/etws/authorize?key=test-key&token=req-token');

    const submitted = await call('etrade_submit_verifier', { verifier: 'VER123' });
    expect(textOf(submitted)).toBe('Authenticated with E*TRADE, account 12345678 (Brokerage).');
    expect((await store.getAccessToken())?.token).toBe('new-token');
  });

  it('cancels a pending login', async () => {
    await call('etrade_login');

    expect(textOf(await call('etrade_cancel_login'))).toBe('E*TRADE authorization cancelled.');
    const again = await call('etrade_cancel_login');
    expect(again.isError).toBe(true);
    expect(await store.getAccessToken()).toBeNull();
  });

  it('rejects a verifier when nothing is pending', async () => {
    const result = await call('etrade_submit_verifier', { verifier: 'VER123' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('No E*TRADE authorization is pending. Call etrade_login first.');
  });

  it('simulates trades at a given price', async () => {
    const bought = await call('portfolio_simulate_trade', { symbol: 'msft', action: 'BUY', quantity: 3, price: 400 });
    expect(JSON.parse(textOf(bought))).toMatchObject({ symbol: 'MSFT', holding: { quantity: 3, costBasis: 400 } });

    const rejected = await call('portfolio_simulate_trade', { symbol: 'MSFT', action: 'SELL', quantity: 5, price: 410 });
    expect(rejected.isError).toBe(true);
    expect(textOf(rejected)).toBe('Simulated trade rejected: Cannot sell 5 shares of MSFT; only 3 held');

    expect(JSON.parse(textOf(await call('portfolio_get')))).toEqual({ MSFT: { quantity: 3, costBasis: 400 } });
    expect(portfolio.getHolding('MSFT')).toEqual({ quantity: 3, costBasis: 400 });
  });

  it('reads and updates the risk profile', async () => {
    expect(textOf(await call('settings_get_risk_profile'))).toBe('Medium');
    expect(textOf(await call('settings_set_risk_profile', { level: 'Low' }))).toBe('Risk profile set to Low.');
    expect(textOf(await call('settings_get_risk_profile'))).toBe('Low');
  });

  it('refuses to place an unknown preview', async () => {
    const result = await call('etrade_place_order', { preview_id: '404' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('No order preview 404 found. Previews expire; run etrade_preview_order again.');
  });

  it('requires a limit price for limit orders', async () => {
    const result = await call('etrade_preview_order', {
      symbol: 'AAPL',
      action: 'BUY',
      quantity: 1,
      price_type: 'LIMIT',
    });

    expect(textOf(result)).toBe('limit_price is required for LIMIT orders.');
  });

  it('stores consumer credentials', async () => {
    const result = await call('etrade_set_consumer_credentials', {
      consumer_key: ' other-key ',
      consumer_secret: 'other-secret',
    });

    expect(textOf(result)).toBe('Consumer credentials saved to the memory credential store.');
    expect(await store.getConsumerCredentials()).toEqual({ key: 'other-key', secret: 'other-secret' });
  });
});

/**
 * MCP Tool Registration
 *
 * Registers the E*TRADE session, market data, portfolio and order tools
 * with the MCP server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { LRUCache } from 'lru-cache';
import * as z from 'zod';
import { NotAuthenticatedError } from '../auth/errors.js';
import type { PendingVerifierSource } from '../auth/verifier.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { EtradeApiError, type EtradeClient } from '../etrade/client.js';
import type { OrderPreview } from '../etrade/types.js';
import { createLogger } from '../logging.js';
import type { PortfolioStore } from '../portfolio/portfolio-store.js';
import { reconcilePortfolio } from '../portfolio/reconcile.js';
import type { Simulator } from '../portfolio/simulator.js';
import { RISK_PROFILES } from '../portfolio/types.js';
import type { UserConfigStore } from '../portfolio/user-config.js';
import type { RecommendationService } from '../recommendations/service.js';
import type { EtradeSession } from '../session/etrade-session.js';
import type { SessionFacade } from '../session/session-facade.js';
import type { ResolvedAccount } from '../session/types.js';

const log = createLogger('tools');

export interface ToolContext {
  facade: SessionFacade;
  /** Null when verifiers are read from the terminal */
  verifier: PendingVerifierSource | null;
  store: CredentialStore;
  client: EtradeClient;
  portfolio: PortfolioStore;
  simulator: Simulator;
  userConfig: UserConfigStore;
  recommendations: RecommendationService;
  /** Order previews awaiting placement, keyed by preview id */
  previews: LRUCache<string, OrderPreview>;
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

function handleToolError(error: unknown): CallToolResult {
  if (error instanceof NotAuthenticatedError) {
    return errorResult(`Not authenticated with E*TRADE: ${error.message}`);
  }
  if (error instanceof EtradeApiError) {
    return errorResult(`E*TRADE API error: ${error.message}`);
  }
  throw error;
}

function describeAccount(account: ResolvedAccount | null): string {
  if (!account) return 'no brokerage account was listed';
  return account.description ? `account ${account.accountId} (${account.description})` : `account ${account.accountId}`;
}

function pendingAuthorization(url: string): string {
  return (
    `Open this URL and authorize the application:\n\n${url}\n\n` +
    'Then call etrade_submit_verifier with the verification code shown by E*TRADE.'
  );
}

type SessionOutcome = { kind: 'session'; session: EtradeSession } | { kind: 'prompt'; url: string };

/**
 * Acquire a session, but return as soon as the acquisition parks on the
 * user's verifier. The acquisition keeps running in the background and is
 * completed by etrade_submit_verifier or the /callback route.
 */
async function sessionOrPrompt(ctx: ToolContext, verifier: PendingVerifierSource): Promise<SessionOutcome> {
  const sessionPromise = ctx.facade.getSession();
  void sessionPromise.then(
    (session) => log.info(`E*TRADE session ready, ${describeAccount(session.account)}`),
    (error: unknown) => log.warn(`E*TRADE login did not complete: ${error instanceof Error ? error.message : String(error)}`)
  );

  const stopWaiting = new AbortController();
  return Promise.race<SessionOutcome>([
    sessionPromise.then((session) => ({ kind: 'session' as const, session })),
    verifier.nextPrompt(stopWaiting.signal).then((url) => ({ kind: 'prompt' as const, url })),
  ]).finally(() => stopWaiting.abort());
}

/**
 * Tools that reach E*TRADE must not block on an interactive handshake
 * inside an MCP call. When the stored token cannot be used without the
 * user (none stored, expired, or its renewal fails) this returns the
 * instructions instead.
 */
async function authorizationRequired(ctx: ToolContext): Promise<CallToolResult | null> {
  if (!ctx.verifier) return null;

  const status = await ctx.facade.status();
  if (status.authorizationUrl) {
    return errorResult(`E*TRADE authorization is pending. ${pendingAuthorization(status.authorizationUrl)}`);
  }
  if (status.state !== 'VALID' && status.state !== 'NEEDS_RENEWAL') {
    const reason = status.state === 'EXPIRED_DAILY' ? 'The E*TRADE access token expired at midnight Eastern.' : 'Not logged in to E*TRADE.';
    return errorResult(`${reason} Call etrade_login to authorize.`);
  }

  try {
    const outcome = await sessionOrPrompt(ctx, ctx.verifier);
    if (outcome.kind === 'prompt') {
      return errorResult(`The stored E*TRADE token could not be renewed. ${pendingAuthorization(outcome.url)}`);
    }
    return null;
  } catch (error) {
    return handleToolError(error);
  }
}

export function registerTools(server: McpServer, ctx: ToolContext): void {
  // ============================================
  // SESSION TOOLS
  // ============================================

  server.tool(
    'etrade_auth_status',
    'Report the E*TRADE token state, resolved account and any pending authorization, without contacting E*TRADE',
    {},
    async () => {
      const status = await ctx.facade.status();
      return jsonResult({
        ...status,
        consumerCredentialsConfigured: await ctx.store.haveConsumerCredentials(),
      });
    }
  );

  server.tool(
    'etrade_set_consumer_credentials',
    'Store the E*TRADE API consumer key and secret in the credential store',
    {
      consumer_key: z.string().min(1).describe('E*TRADE consumer key'),
      consumer_secret: z.string().min(1).describe('E*TRADE consumer secret'),
    },
    async ({ consumer_key, consumer_secret }) => {
      await ctx.store.setConsumerCredentials(consumer_key.trim(), consumer_secret.trim());
      return textResult(`Consumer credentials saved to the ${ctx.store.backendName} credential store.`);
    }
  );

  server.tool(
    'etrade_login',
    'Authenticate with E*TRADE. Reuses or renews a stored token when possible; otherwise returns the authorization URL to open',
    {},
    async () => {
      const pendingUrl = ctx.verifier?.pending();
      if (pendingUrl) {
        return textResult(
          `Authorization already pending. Open this URL and authorize the application:\n\n${pendingUrl}\n\n` +
            'Then call etrade_submit_verifier with the verification code.'
        );
      }

      try {
        if (!ctx.verifier) {
          const session = await ctx.facade.getSession();
          return textResult(`Authenticated with E*TRADE, ${describeAccount(session.account)}.`);
        }

        const outcome = await sessionOrPrompt(ctx, ctx.verifier);
        if (outcome.kind === 'session') {
          return textResult(`Authenticated with E*TRADE, ${describeAccount(outcome.session.account)}.`);
        }
        return textResult(pendingAuthorization(outcome.url));
      } catch (error) {
        return handleToolError(error);
      }
    }
  );

  server.tool(
    'etrade_submit_verifier',
    'Complete a pending E*TRADE authorization with the verification code',
    {
      verifier: z.string().min(1).describe('Verification code shown by E*TRADE after authorizing'),
    },
    async ({ verifier }) => {
      if (!ctx.verifier) {
        return errorResult('This server reads verification codes from its terminal.');
      }
      if (!ctx.verifier.submit(verifier)) {
        return errorResult('No E*TRADE authorization is pending. Call etrade_login first.');
      }

      try {
        const session = await ctx.facade.getSession();
        return textResult(`Authenticated with E*TRADE, ${describeAccount(session.account)}.`);
      } catch (error) {
        return handleToolError(error);
      }
    }
  );

  server.tool(
    'etrade_cancel_login',
    'Abandon a pending E*TRADE authorization',
    {},
    async () => {
      if (!ctx.verifier?.cancel()) {
        return errorResult('No E*TRADE authorization is pending.');
      }
      return textResult('E*TRADE authorization cancelled.');
    }
  );

  server.tool(
    'etrade_logout',
    'Revoke and forget the stored E*TRADE access token',
    {},
    async () => {
      await ctx.facade.logout();
      ctx.previews.clear();
      return textResult('Logged out of E*TRADE.');
    }
  );

  // ============================================
  // MARKET DATA TOOLS
  // ============================================

  server.tool(
    'etrade_get_quote',
    'Get a real-time quote for a stock symbol',
    {
      symbol: z.string().min(1).describe('Ticker symbol, e.g. AAPL'),
    },
    async ({ symbol }) => {
      const blocked = await authorizationRequired(ctx);
      if (blocked) return blocked;

      try {
        return jsonResult(await ctx.client.getQuote(symbol.trim().toUpperCase()));
      } catch (error) {
        return handleToolError(error);
      }
    }
  );

  server.tool(
    'etrade_get_recommendation',
    'Analyze quote, price history and news for a symbol and return a recommendation screened against the risk profile',
    {
      symbol: z.string().min(1).describe('Ticker symbol, e.g. AAPL'),
    },
    async ({ symbol }) => {
      const blocked = await authorizationRequired(ctx);
      if (blocked) return blocked;

      try {
        const outcome = await ctx.recommendations.recommend(symbol);
        if (outcome.withheld) {
          return jsonResult({
            message:
              `The ${outcome.recommendation.riskLevel} risk recommendation for ${outcome.recommendation.ticker} ` +
              `exceeds your ${outcome.riskProfile} risk profile.`,
            ...outcome,
          });
        }
        return jsonResult(outcome);
      } catch (error) {
        return handleToolError(error);
      }
    }
  );

  // ============================================
  // PORTFOLIO TOOLS
  // ============================================

  server.tool(
    'portfolio_get',
    'Show the locally simulated portfolio',
    {},
    async () => jsonResult(ctx.portfolio.getHoldings())
  );

  server.tool(
    'portfolio_simulate_trade',
    'Simulate a trade against the local portfolio. Without a price the current quote is used',
    {
      symbol: z.string().min(1).describe('Ticker symbol'),
      action: z.enum(['BUY', 'SELL']).describe('Trade direction'),
      quantity: z.number().int().positive().describe('Number of shares'),
      price: z.number().positive().optional().describe('Execution price per share'),
    },
    async ({ symbol, action, quantity, price }) => {
      const ticker = symbol.trim().toUpperCase();
      let executionPrice = price;

      if (executionPrice === undefined) {
        const blocked = await authorizationRequired(ctx);
        if (blocked) return blocked;
        try {
          const quote = await ctx.client.getQuote(ticker);
          if (quote.lastPrice === null) {
            return errorResult(`No last trade price available for ${ticker}; pass a price.`);
          }
          executionPrice = quote.lastPrice;
        } catch (error) {
          return handleToolError(error);
        }
      }

      const result = await ctx.simulator.execute({ symbol: ticker, action, quantity, price: executionPrice });
      if (result.status === 'rejected') {
        return errorResult(`Simulated trade rejected: ${result.reason}`);
      }
      return jsonResult(result.fill);
    }
  );

  server.tool(
    'portfolio_reconcile',
    'Compare the simulated portfolio with live E*TRADE positions',
    {},
    async () => {
      const blocked = await authorizationRequired(ctx);
      if (blocked) return blocked;

      try {
        const positions = await ctx.client.listPositions();
        return jsonResult(reconcilePortfolio(ctx.portfolio.getHoldings(), positions));
      } catch (error) {
        return handleToolError(error);
      }
    }
  );

  // ============================================
  // SETTINGS TOOLS
  // ============================================

  server.tool(
    'settings_get_risk_profile',
    'Get the risk profile used to screen recommendations',
    {},
    async () => textResult(ctx.userConfig.getRiskProfile())
  );

  server.tool(
    'settings_set_risk_profile',
    'Set the risk profile used to screen recommendations',
    {
      level: z.enum(RISK_PROFILES).describe('Risk tolerance'),
    },
    async ({ level }) => {
      if (!(await ctx.userConfig.setRiskProfile(level))) {
        return errorResult(`Invalid risk level "${level}".`);
      }
      return textResult(`Risk profile set to ${level}.`);
    }
  );

  // ============================================
  // ORDER TOOLS
  // ============================================

  server.tool(
    'etrade_preview_order',
    'Preview an equity order on the resolved E*TRADE account. Returns a preview id for etrade_place_order',
    {
      symbol: z.string().min(1).describe('Ticker symbol'),
      action: z.enum(['BUY', 'SELL']).describe('Order direction'),
      quantity: z.number().int().positive().describe('Number of shares'),
      price_type: z.enum(['MARKET', 'LIMIT']).default('MARKET').describe('Order price type'),
      limit_price: z.number().positive().optional().describe('Limit price, required for LIMIT orders'),
    },
    async ({ symbol, action, quantity, price_type, limit_price }) => {
      if (price_type === 'LIMIT' && limit_price === undefined) {
        return errorResult('limit_price is required for LIMIT orders.');
      }
      const blocked = await authorizationRequired(ctx);
      if (blocked) return blocked;

      try {
        const preview = await ctx.client.previewOrder({
          symbol: symbol.trim().toUpperCase(),
          action,
          quantity,
          priceType: price_type,
          ...(price_type === 'LIMIT' ? { limitPrice: limit_price } : {}),
        });
        ctx.previews.set(preview.previewId, preview);
        return jsonResult(preview);
      } catch (error) {
        return handleToolError(error);
      }
    }
  );

  server.tool(
    'etrade_place_order',
    'Place an order previously returned by etrade_preview_order',
    {
      preview_id: z.string().min(1).describe('Preview id from etrade_preview_order'),
    },
    async ({ preview_id }) => {
      const preview = ctx.previews.get(preview_id);
      if (!preview) {
        return errorResult(`No order preview ${preview_id} found. Previews expire; run etrade_preview_order again.`);
      }
      const blocked = await authorizationRequired(ctx);
      if (blocked) return blocked;

      try {
        const placed = await ctx.client.placeOrder(preview);
        ctx.previews.delete(preview_id);
        return jsonResult(placed);
      } catch (error) {
        return handleToolError(error);
      }
    }
  );
}

#!/usr/bin/env node
/**
 * E*TRADE MCP Server - Entry Point
 *
 * A local MCP server that gives an AI assistant access to an E*TRADE
 * brokerage account. OAuth 1.0a tokens are kept in the platform credential
 * store and renewed or re-authorized as E*TRADE's token rules require.
 */

import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import { LRUCache } from 'lru-cache';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './config.js';
import { createLogger, setLogLevel } from './logging.js';
import { CredentialStore, createSecretBackend } from './credentials/index.js';
import {
  AccountResolver,
  ConsoleVerifierSource,
  OAuthSessionController,
  PendingVerifierSource,
  TokenManager,
} from './auth/index.js';
import { SessionFacade } from './session/index.js';
import { EtradeClient, type OrderPreview } from './etrade/index.js';
import { PortfolioStore, Simulator, UserConfigStore } from './portfolio/index.js';
import { OpenAICompatibleEngine, RecommendationService } from './recommendations/index.js';
import { registerTools, type ToolContext } from './tools/index.js';

// Load configuration
const config = loadConfig();
setLogLevel(config.logging.level);

const log = createLogger('server');
const httpLog = createLogger('http');

// ============================================
// SERVICES
// ============================================

const store = new CredentialStore(createSecretBackend(config.credentials));

// Verifier codes arrive through MCP tools and /callback, or from the terminal
const pendingVerifier = config.verifier.mode === 'http' ? new PendingVerifierSource() : null;
const verifierSource = pendingVerifier ?? new ConsoleVerifierSource();

const accountResolver = new AccountResolver(config.etrade.apiBaseUrl);
const facade = new SessionFacade({
  store,
  etradeConfig: config.etrade,
  tokenManager: new TokenManager(store, config.etrade, {
    idleRenewalMinutes: config.tokens.idleRenewalMinutes,
    timeZone: config.tokens.timeZone,
  }),
  handshake: new OAuthSessionController(store, config.etrade, verifierSource, accountResolver),
  accountResolver,
  ...(pendingVerifier ? { prompt: pendingVerifier } : {}),
});

const client = new EtradeClient(facade, config.etrade.apiBaseUrl);
const portfolio = await PortfolioStore.load(config.data.portfolioPath);
const userConfig = await UserConfigStore.load(config.data.userConfigPath);

const context: ToolContext = {
  facade,
  verifier: pendingVerifier,
  store,
  client,
  portfolio,
  simulator: new Simulator(portfolio),
  userConfig,
  recommendations: new RecommendationService(client, new OpenAICompatibleEngine(config.model), userConfig),
  previews: new LRUCache<string, OrderPreview>({ max: 50, ttl: 10 * 60 * 1000 }),
};

// Track active transports by session ID
const transports: Record<string, StreamableHTTPServerTransport> = {};

// Create Express app
const app = express();

// ============================================
// MIDDLEWARE SETUP
// ============================================

// JSON body parsing
app.use(express.json());

// CORS configuration - allows MCP clients on the configured origins
const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (like curl or same-origin)
    if (!origin) {
      callback(null, true);
      return;
    }
    if (config.security.allowedOrigins.includes(origin) || config.security.allowedOrigins.includes('*')) {
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'mcp-session-id', 'Authorization'],
  exposedHeaders: ['mcp-session-id'],
  credentials: true,
  maxAge: 86400, // Cache preflight for 24 hours
};
app.use(cors(corsOptions));

// Rate limiting
const limiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Too many requests, please try again later' },
    id: null,
  },
  skip: (req) => req.path === '/health',
});
app.use(limiter);

// Request logging middleware
app.use((req, res, next) => {
  const start = Date.now();

  res.on('finish', () => {
    const message = `${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`;
    if (res.statusCode >= 400) {
      httpLog.warn(message);
    } else {
      httpLog.debug(`${message} - ${req.ip}`);
    }
  });

  next();
});

/**
 * Create a new MCP server instance for a transport
 */
function createMcpServer(): McpServer {
  const server = new McpServer({
    name: 'etrade-mcp',
    version: '0.1.0',
  });

  registerTools(server, context);

  return server;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

function invalidSession(res: express.Response, message: string): void {
  res.status(400).json({
    jsonrpc: '2.0',
    error: { code: -32000, message },
    id: null,
  });
}

/**
 * MCP Endpoint - POST /mcp
 * Handles JSON-RPC requests, notifications, and responses
 */
app.post('/mcp', async (req, res) => {
  const sessionId = sessionIdOf(req);
  let transport: StreamableHTTPServerTransport;

  const existing = sessionId ? transports[sessionId] : undefined;
  if (existing) {
    transport = existing;
  } else if (!sessionId && isInitializeRequest(req.body)) {
    transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        transports[id] = transport;
        log.info(`MCP session initialized: ${id}`);
      },
      onsessionclosed: (id) => {
        delete transports[id];
        log.info(`MCP session closed: ${id}`);
      },
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        delete transports[transport.sessionId];
      }
    };

    await createMcpServer().connect(transport);
  } else {
    invalidSession(res, 'Invalid session or missing MCP-Session-Id header');
    return;
  }

  await transport.handleRequest(req, res, req.body);
});

/**
 * MCP Endpoint - GET /mcp (SSE stream) and DELETE /mcp (terminate)
 */
async function handleSessionRequest(req: express.Request, res: express.Response): Promise<void> {
  const sessionId = sessionIdOf(req);
  const transport = sessionId ? transports[sessionId] : undefined;

  if (!transport) {
    invalidSession(res, 'Invalid session');
    return;
  }

  await transport.handleRequest(req, res);
}

app.get('/mcp', handleSessionRequest);
app.delete('/mcp', handleSessionRequest);

/**
 * OAuth Callback - GET /callback
 * E*TRADE redirects here with the verifier when a callback URL is registered
 */
app.get('/callback', async (req, res) => {
  const verifier = req.query.oauth_verifier;

  if (typeof verifier !== 'string' || !verifier.trim()) {
    res.status(400).send('Missing oauth_verifier parameter');
    return;
  }
  if (!pendingVerifier?.submit(verifier)) {
    res.status(409).send('No E*TRADE authorization is pending');
    return;
  }

  try {
    const session = await facade.getSession();
    const account = session.account ? `Account: <strong>${session.account.accountId}</strong>` : 'No brokerage account was listed.';
    res.send(`
      <!DOCTYPE html>
      <html>
        <head><title>E*TRADE MCP - Authorized</title></head>
        <body style="font-family: sans-serif; padding: 40px; text-align: center;">
          <h1>Authorization Successful</h1>
          <p>You have successfully connected your E*TRADE account.</p>
          <p>${account}</p>
          <p>You can now close this window and return to your AI assistant.</p>
        </body>
      </html>
    `);
  } catch (err) {
    log.error(`OAuth callback error: ${err instanceof Error ? err.message : String(err)}`);
    res.status(500).send('Failed to complete authorization');
  }
});

/**
 * Health check endpoint
 */
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    version: '0.1.0',
    activeSessions: Object.keys(transports).length,
    sandbox: config.etrade.sandbox,
  });
});

// Start server
const port = config.server.port;
const host = config.server.host;

app.listen(port, host, () => {
  log.info(`E*TRADE MCP Server running at http://${host}:${port}`);
  log.info(`MCP endpoint: http://${host}:${port}/mcp`);
  log.info(`OAuth callback: http://${host}:${port}/callback`);
  log.info(`Credential backend: ${store.backendName}; ${config.etrade.sandbox ? 'sandbox' : 'production'} API`);
});

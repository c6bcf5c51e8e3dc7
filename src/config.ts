/**
 * Configuration management for the E*TRADE MCP Server
 */

import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type CredentialBackendType = 'keyring' | 'file' | 'memory';

/**
 * Model backend, resolved once at startup.
 * `transformers` talks to a hosted text-generation server; `local-model`
 * to a llama.cpp server loaded from a GGUF file.
 *
 * Only `baseUrl`, `apiKey` and the model name reach a request. `device`,
 * `dtype`, `gpuLayers`, `useMmap` and `useMlock` record how that server was
 * launched; the OpenAI-compatible API takes no such options, so they are
 * only reported in the startup log.
 */
export type ModelBackendConfig =
  | {
      kind: 'transformers';
      baseUrl: string;
      apiKey: string;
      model: string;
      device: 'cpu' | 'cuda';
      dtype: string;
    }
  | {
      kind: 'local-model';
      baseUrl: string;
      apiKey: string;
      modelPath: string;
      gpuLayers: number;
      useMmap: boolean;
      useMlock: boolean;
    };

export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
  };
  etrade: {
    sandbox: boolean;
    apiBaseUrl: string;
    oauthBaseUrl: string;
    authorizeUrl: string;
    callback: string;
    userAgent: string;
  };
  credentials: {
    backend: CredentialBackendType;
    service: string;
    filePath: string;
  };
  tokens: {
    idleRenewalMinutes: number;
    timeZone: string;
  };
  verifier: {
    mode: 'http' | 'console';
  };
  model: ModelBackendConfig;
  data: {
    portfolioPath: string;
    userConfigPath: string;
  };
  security: {
    allowedOrigins: string[];
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  logging: {
    level: LogLevel;
  };
}

function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getBooleanEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function oneOf<T extends string>(key: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Invalid value for ${key}: "${value}" (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

export function loadModelBackend(): ModelBackendConfig {
  const kind = oneOf('MODEL_BACKEND', getEnvOrDefault('MODEL_BACKEND', 'transformers'), [
    'transformers',
    'local-model',
  ] as const);
  const baseUrl = getEnvOrDefault('MODEL_BASE_URL', 'http://localhost:8080/v1');
  // Local inference servers accept any key
  const apiKey = getEnvOrDefault('MODEL_API_KEY', 'local');

  if (kind === 'local-model') {
    return {
      kind,
      baseUrl,
      apiKey,
      modelPath: getEnvOrThrow('MODEL_PATH'),
      gpuLayers: parseInt(getEnvOrDefault('MODEL_GPU_LAYERS', '0'), 10),
      useMmap: getBooleanEnv('MODEL_USE_MMAP', true),
      useMlock: getBooleanEnv('MODEL_USE_MLOCK', false),
    };
  }

  return {
    kind,
    baseUrl,
    apiKey,
    model: getEnvOrDefault('MODEL_NAME', 'mistralai/Mistral-7B-Instruct-v0.2'),
    device: oneOf('MODEL_DEVICE', getEnvOrDefault('MODEL_DEVICE', 'cpu'), ['cpu', 'cuda'] as const),
    dtype: getEnvOrDefault('MODEL_DTYPE', 'auto'),
  };
}

export function loadConfig(): Config {
  const sandbox = getBooleanEnv('ETRADE_SANDBOX', true);

  return {
    server: {
      port: parseInt(getEnvOrDefault('PORT', '3000'), 10),
      host: getEnvOrDefault('HOST', 'localhost'),
      nodeEnv: oneOf('NODE_ENV', getEnvOrDefault('NODE_ENV', 'development'), [
        'development',
        'production',
        'test',
      ] as const),
    },
    etrade: {
      sandbox,
      apiBaseUrl: sandbox ? 'https://apisb.etrade.com' : 'https://api.etrade.com',
      oauthBaseUrl: 'https://api.etrade.com',
      authorizeUrl: 'https://us.etrade.com/e/t/etws/authorize',
      callback: getEnvOrDefault('ETRADE_CALLBACK', 'oob'),
      userAgent: 'EtradeMCP/0.1.0',
    },
    credentials: {
      backend: oneOf('CREDENTIAL_BACKEND', getEnvOrDefault('CREDENTIAL_BACKEND', 'keyring'), [
        'keyring',
        'file',
        'memory',
      ] as const),
      service: getEnvOrDefault('CREDENTIAL_SERVICE', 'EtradeMcp:ETrade'),
      filePath: getEnvOrDefault('CREDENTIAL_FILE', 'user_data/credentials.json'),
    },
    tokens: {
      idleRenewalMinutes: parseInt(getEnvOrDefault('TOKEN_IDLE_MINUTES', '90'), 10),
      timeZone: getEnvOrDefault('TOKEN_TIME_ZONE', 'America/New_York'),
    },
    verifier: {
      mode: oneOf('VERIFIER_MODE', getEnvOrDefault('VERIFIER_MODE', 'http'), ['http', 'console'] as const),
    },
    model: loadModelBackend(),
    data: {
      portfolioPath: getEnvOrDefault('PORTFOLIO_FILE', 'user_data/portfolio.json'),
      userConfigPath: getEnvOrDefault('USER_CONFIG_FILE', 'user_data/user_config.json'),
    },
    security: {
      allowedOrigins: getEnvOrDefault('ALLOWED_ORIGINS', 'http://localhost:3000').split(','),
    },
    rateLimit: {
      windowMs: parseInt(getEnvOrDefault('RATE_LIMIT_WINDOW_MS', '900000'), 10), // 15 minutes
      maxRequests: parseInt(getEnvOrDefault('RATE_LIMIT_MAX', '1000'), 10),
    },
    logging: {
      level: oneOf('LOG_LEVEL', getEnvOrDefault('LOG_LEVEL', 'info'), ['debug', 'info', 'warn', 'error'] as const),
    },
  };
}

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, loadModelBackend } from '../src/config.js';

const CONFIG_ENV = [
  'PORT',
  'ETRADE_SANDBOX',
  'ETRADE_CALLBACK',
  'CREDENTIAL_BACKEND',
  'CREDENTIAL_SERVICE',
  'TOKEN_IDLE_MINUTES',
  'VERIFIER_MODE',
  'MODEL_BACKEND',
  'MODEL_BASE_URL',
  'MODEL_API_KEY',
  'MODEL_NAME',
  'MODEL_DEVICE',
  'MODEL_PATH',
  'MODEL_GPU_LAYERS',
  'MODEL_USE_MMAP',
  'MODEL_USE_MLOCK',
  'LOG_LEVEL',
];

describe('loadConfig', () => {
  beforeEach(() => {
    CONFIG_ENV.forEach((name) => vi.stubEnv(name, ''));
  });

  it('applies defaults', () => {
    const config = loadConfig();

    expect(config.server.port).toBe(3000);
    expect(config.etrade).toEqual({
      sandbox: true,
      apiBaseUrl: 'https://apisb.etrade.com',
      oauthBaseUrl: 'https://api.etrade.com',
      authorizeUrl: 'https://us.etrade.com/e/t/etws/authorize',
      callback: 'oob',
      userAgent: 'EtradeMCP/0.1.0',
    });
    expect(config.credentials.backend).toBe('keyring');
    expect(config.credentials.service).toBe('EtradeMcp:ETrade');
    expect(config.tokens.idleRenewalMinutes).toBe(90);
    expect(config.verifier.mode).toBe('http');
    expect(config.logging.level).toBe('info');
  });

  it('switches to the production API', () => {
    vi.stubEnv('ETRADE_SANDBOX', 'false');

    expect(loadConfig().etrade.apiBaseUrl).toBe('https://api.etrade.com');
  });

  it('rejects an unknown credential backend', () => {
    vi.stubEnv('CREDENTIAL_BACKEND', 'vault');

    expect(() => loadConfig()).toThrow('Invalid value for CREDENTIAL_BACKEND: "vault" (expected one of keyring, file, memory)');
  });
});

describe('loadModelBackend', () => {
  beforeEach(() => {
    CONFIG_ENV.forEach((name) => vi.stubEnv(name, ''));
  });

  it('defaults to the transformers backend on cpu', () => {
    expect(loadModelBackend()).toEqual({
      kind: 'transformers',
      baseUrl: 'http://localhost:8080/v1',
      apiKey: 'local',
      model: 'mistralai/Mistral-7B-Instruct-v0.2',
      device: 'cpu',
      dtype: 'auto',
    });
  });

  it('reads local model settings', () => {
    vi.stubEnv('MODEL_BACKEND', 'local-model');
    vi.stubEnv('MODEL_PATH', '/models/test.gguf');
    vi.stubEnv('MODEL_GPU_LAYERS', '35');
    vi.stubEnv('MODEL_USE_MLOCK', 'yes');

    expect(loadModelBackend()).toEqual({
      kind: 'local-model',
      baseUrl: 'http://localhost:8080/v1',
      apiKey: 'local',
      modelPath: '/models/test.gguf',
      gpuLayers: 35,
      useMmap: true,
      useMlock: true,
    });
  });

  it('requires a model path for the local backend', () => {
    vi.stubEnv('MODEL_BACKEND', 'local-model');

    expect(() => loadModelBackend()).toThrow('Missing required environment variable: MODEL_PATH');
  });

  it('rejects an unknown device', () => {
    vi.stubEnv('MODEL_DEVICE', 'tpu');

    expect(() => loadModelBackend()).toThrow('Invalid value for MODEL_DEVICE');
  });
});

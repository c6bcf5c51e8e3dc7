/**
 * Credential store
 *
 * Holds the consumer credential pair and the current access token triple
 * (token, token secret, issuance time) in a secret backend. Entries the
 * backend does not have are looked up in the environment as
 * `ETRADE_<ENTRY>` (e.g. `consumer_key` -> `ETRADE_CONSUMER_KEY`).
 */

import * as z from 'zod';
import { createLogger } from '../logging.js';
import {
  ACCESS_TOKEN_ENTRIES,
  SECRET_ENTRIES,
  type PartialConsumerCredential,
  type SecretBackend,
  type SecretEntry,
  type StoredAccessToken,
} from './types.js';

const log = createLogger('credentials');

const OFFSET_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/;
const issuedAtSchema = z.string().datetime({ offset: true, local: true });

export interface CredentialStoreOptions {
  /** Environment consulted when the backend has no value (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Prefix for environment fallback names (default: 'ETRADE') */
  envPrefix?: string;
}

export function envNameFor(entry: SecretEntry, prefix = 'ETRADE'): string {
  return `${prefix}_${entry}`.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
}

/**
 * Parse a stored ISO-8601 issuance timestamp. Values without an offset are
 * UTC; anything that is not ISO-8601 date-time is rejected.
 */
export function parseIssuedAt(value: string): Date | null {
  const trimmed = value.trim();
  if (!issuedAtSchema.safeParse(trimmed).success) return null;
  const normalized = OFFSET_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export class CredentialStore {
  private backend: SecretBackend;
  private env: NodeJS.ProcessEnv;
  private envPrefix: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(backend: SecretBackend, options: CredentialStoreOptions = {}) {
    this.backend = backend;
    this.env = options.env ?? process.env;
    this.envPrefix = options.envPrefix ?? 'ETRADE';
  }

  get backendName(): string {
    return this.backend.name;
  }

  async setConsumerCredentials(key: string, secret: string): Promise<void> {
    await this.serialize(async () => {
      await this.backend.set('consumer_key', key);
      await this.backend.set('consumer_secret', secret);
    });
    log.info(`Consumer credentials stored in ${this.backend.name} backend`);
  }

  async getConsumerCredentials(): Promise<PartialConsumerCredential> {
    const [key, secret] = await Promise.all([this.read('consumer_key'), this.read('consumer_secret')]);
    return { key, secret };
  }

  async haveConsumerCredentials(): Promise<boolean> {
    const { key, secret } = await this.getConsumerCredentials();
    return Boolean(key && secret);
  }

  /**
   * Store a new access token. A failure part-way through is not rolled back.
   */
  async setAccessToken(token: string, tokenSecret: string, issuedAtIso: string): Promise<void> {
    await this.serialize(async () => {
      await this.backend.set('access_token', token);
      await this.backend.set('access_token_secret', tokenSecret);
      await this.backend.set('token_issued', issuedAtIso);
    });
  }

  /**
   * Rewrite only the issuance time (renewal extends the token's window
   * without rotating it)
   */
  async touchIssuedAt(issuedAtIso: string): Promise<void> {
    await this.serialize(() => this.backend.set('token_issued', issuedAtIso));
  }

  /**
   * Current access token, or null when any part is missing or the
   * issuance time does not parse
   */
  async getAccessToken(): Promise<StoredAccessToken | null> {
    const [token, tokenSecret, issuedIso] = await Promise.all(
      ACCESS_TOKEN_ENTRIES.map((entry) => this.read(entry))
    );
    if (!token || !tokenSecret || !issuedIso) {
      return null;
    }

    const issuedAt = parseIssuedAt(issuedIso);
    if (!issuedAt) {
      log.warn(`Stored token issuance time is not a valid timestamp: "${issuedIso}"`);
      return null;
    }

    return { token, tokenSecret, issuedAt };
  }

  async clearAccessToken(): Promise<void> {
    await this.serialize(() => this.deleteEntries(ACCESS_TOKEN_ENTRIES));
  }

  /**
   * Delete every stored entry. Entries that cannot be deleted (usually
   * because they do not exist) are skipped.
   */
  async clearAllCredentials(): Promise<void> {
    await this.serialize(() => this.deleteEntries(SECRET_ENTRIES));
    log.info('All stored credentials cleared');
  }

  private async deleteEntries(entries: readonly SecretEntry[]): Promise<void> {
    for (const entry of entries) {
      try {
        await this.backend.delete(entry);
      } catch (error) {
        log.debug(`Skipping ${entry}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  private async read(entry: SecretEntry): Promise<string | null> {
    let value: string | null = null;
    try {
      value = await this.backend.get(entry);
    } catch (error) {
      log.warn(
        `Could not read ${entry} from ${this.backend.name} backend: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (value) return value;
    return this.env[envNameFor(entry, this.envPrefix)] || null;
  }

  /**
   * Run writes one group at a time
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * In-memory secret backend for development/testing
 */

import type { SecretBackend, SecretEntry } from './types.js';

export class MemorySecretBackend implements SecretBackend {
  readonly name = 'memory';
  private secrets: Map<SecretEntry, string> = new Map();

  async get(entry: SecretEntry): Promise<string | null> {
    return this.secrets.get(entry) ?? null;
  }

  async set(entry: SecretEntry, value: string): Promise<void> {
    this.secrets.set(entry, value);
  }

  async delete(entry: SecretEntry): Promise<void> {
    this.secrets.delete(entry);
  }

  /** Number of stored entries */
  get size(): number {
    return this.secrets.size;
  }
}

/**
 * Platform secret vault (Windows Credential Manager, macOS Keychain,
 * Secret Service on Linux)
 */

import { Entry } from '@napi-rs/keyring';
import type { SecretBackend, SecretEntry } from './types.js';

export class KeyringSecretBackend implements SecretBackend {
  readonly name = 'keyring';
  private service: string;

  constructor(service: string) {
    this.service = service;
  }

  async get(entry: SecretEntry): Promise<string | null> {
    return new Entry(this.service, entry).getPassword() ?? null;
  }

  async set(entry: SecretEntry, value: string): Promise<void> {
    new Entry(this.service, entry).setPassword(value);
  }

  async delete(entry: SecretEntry): Promise<void> {
    new Entry(this.service, entry).deletePassword();
  }
}

/**
 * Credential storage
 */

import type { Config } from '../config.js';
import { FileSecretBackend } from './file-backend.js';
import { KeyringSecretBackend } from './keyring-backend.js';
import { MemorySecretBackend } from './memory-backend.js';
import type { SecretBackend } from './types.js';

export { CredentialStore, envNameFor, parseIssuedAt } from './credential-store.js';
export type { CredentialStoreOptions } from './credential-store.js';
export { FileSecretBackend } from './file-backend.js';
export { KeyringSecretBackend } from './keyring-backend.js';
export { MemorySecretBackend } from './memory-backend.js';
export * from './types.js';

/**
 * Pick the secret backend named by configuration
 */
export function createSecretBackend(config: Config['credentials']): SecretBackend {
  switch (config.backend) {
    case 'keyring':
      return new KeyringSecretBackend(config.service);
    case 'file':
      return new FileSecretBackend(config.filePath);
    case 'memory':
      return new MemorySecretBackend();
  }
}

/**
 * Credential types for the E*TRADE MCP Server
 */

export interface ConsumerCredential {
  key: string;
  secret: string;
}

/** Consumer credential components, each independently absent */
export interface PartialConsumerCredential {
  key: string | null;
  secret: string | null;
}

export interface StoredAccessToken {
  token: string;
  tokenSecret: string;
  /** Issuance instant (UTC) */
  issuedAt: Date;
}

/**
 * Storage facility behind the credential store (platform vault, file, memory)
 */
export interface SecretBackend {
  /** Human-readable backend name for logs */
  readonly name: string;
  /** Read a secret; null when the entry does not exist */
  get(entry: SecretEntry): Promise<string | null>;
  /** Create or overwrite a secret */
  set(entry: SecretEntry, value: string): Promise<void>;
  /** Delete a secret; throws if the backend refuses */
  delete(entry: SecretEntry): Promise<void>;
}

export const SECRET_ENTRIES = [
  'consumer_key',
  'consumer_secret',
  'access_token',
  'access_token_secret',
  'token_issued',
] as const;

export type SecretEntry = (typeof SECRET_ENTRIES)[number];

export const ACCESS_TOKEN_ENTRIES = ['access_token', 'access_token_secret', 'token_issued'] as const satisfies readonly SecretEntry[];

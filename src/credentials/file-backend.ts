/**
 * JSON-file secret backend for hosts without a platform vault.
 *
 * The file holds a flat `{ entry: value }` object and is written with
 * owner-only permissions.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import * as z from 'zod';
import type { SecretBackend, SecretEntry } from './types.js';

const secretFileSchema = z.record(z.string(), z.string());

type SecretFile = z.infer<typeof secretFileSchema>;

export class FileSecretBackend implements SecretBackend {
  readonly name = 'file';
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async get(entry: SecretEntry): Promise<string | null> {
    const secrets = await this.read();
    return secrets[entry] ?? null;
  }

  async set(entry: SecretEntry, value: string): Promise<void> {
    const secrets = await this.read();
    secrets[entry] = value;
    await this.write(secrets);
  }

  async delete(entry: SecretEntry): Promise<void> {
    const secrets = await this.read();
    if (!(entry in secrets)) return;
    delete secrets[entry];
    await this.write(secrets);
  }

  private async read(): Promise<SecretFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
    return secretFileSchema.parse(JSON.parse(raw));
  }

  private async write(secrets: SecretFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(secrets, null, 2), { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tmp, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

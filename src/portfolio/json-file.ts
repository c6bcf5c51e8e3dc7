/**
 * JSON file helpers for local user data
 */

import fs from 'node:fs/promises';
import path from 'node:path';

export type ReadResult =
  | { status: 'ok'; value: unknown }
  | { status: 'missing' }
  | { status: 'invalid'; error: Error };

export async function readJsonFile(filePath: string): Promise<ReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return { status: 'missing' };
    }
    throw error;
  }

  try {
    return { status: 'ok', value: JSON.parse(raw) };
  } catch (error) {
    return { status: 'invalid', error: error instanceof Error ? error : new Error(String(error)) };
  }
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 4)}\n`, 'utf-8');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

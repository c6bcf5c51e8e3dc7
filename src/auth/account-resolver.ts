/**
 * Default brokerage account lookup
 */

import * as z from 'zod';
import { createLogger } from '../logging.js';
import type { AuthenticatedSession, ResolvedAccount } from '../session/types.js';

const log = createLogger('account-resolver');

const accountSchema = z.object({
  accountId: z.union([z.string(), z.number()]).transform(String),
  accountIdKey: z.string(),
  accountDesc: z.string().optional(),
  accountName: z.string().optional(),
});

export const accountListSchema = z.object({
  AccountListResponse: z.object({
    Accounts: z
      .object({
        Account: z.array(accountSchema).default([]),
      })
      .default({ Account: [] }),
  }),
});

export class AccountResolver {
  private apiBaseUrl: string;

  constructor(apiBaseUrl: string) {
    this.apiBaseUrl = apiBaseUrl;
  }

  /**
   * Pick the first account the provider lists. Returns null (and logs a
   * warning) when there is none or the call fails; market data and
   * analysis work without an account.
   */
  async resolve(session: AuthenticatedSession): Promise<ResolvedAccount | null> {
    let payload: unknown;
    try {
      const response = await session.request('GET', `${this.apiBaseUrl}/v1/accounts/list.json`);
      if (!response.ok) {
        log.warn(`Account list request failed: ${response.status} ${response.statusText}`);
        return null;
      }
      payload = await response.json();
    } catch (error) {
      log.warn(`Account list request failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const parsed = accountListSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn(`Unexpected account list response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      return null;
    }

    const first = parsed.data.AccountListResponse.Accounts.Account[0];
    if (!first) {
      log.warn('No E*TRADE accounts found for the authenticated user');
      return null;
    }

    const account: ResolvedAccount = {
      accountId: first.accountId,
      accountIdKey: first.accountIdKey,
      description: first.accountDesc ?? first.accountName,
    };
    log.info(`Default account resolved: ${account.accountId}`);
    return account;
  }
}

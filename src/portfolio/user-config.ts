/**
 * User preferences (risk profile) persisted as a JSON file
 */

import * as z from 'zod';
import { createLogger } from '../logging.js';
import { readJsonFile, writeJsonFile } from './json-file.js';
import { RISK_PROFILES, type RiskProfile } from './types.js';

const log = createLogger('user-config');

const userConfigSchema = z
  .object({
    risk_profile: z.enum(RISK_PROFILES).default('Medium'),
  })
  .passthrough();

type UserConfigFile = z.infer<typeof userConfigSchema>;

const DEFAULT_CONFIG: UserConfigFile = { risk_profile: 'Medium' };

export function isRiskProfile(value: string): value is RiskProfile {
  return RISK_PROFILES.some((profile) => profile === value);
}

export class UserConfigStore {
  private filePath: string;
  private config: UserConfigFile;

  private constructor(filePath: string, config: UserConfigFile) {
    this.filePath = filePath;
    this.config = config;
  }

  /**
   * Load preferences, creating the file with defaults when it is missing.
   * A corrupt file falls back to defaults without being overwritten.
   */
  static async load(filePath: string): Promise<UserConfigStore> {
    const result = await readJsonFile(filePath);
    if (result.status === 'missing') {
      log.info(`${filePath} not found, creating it with default configuration`);
      const store = new UserConfigStore(filePath, { ...DEFAULT_CONFIG });
      await store.save();
      return store;
    }
    if (result.status === 'invalid') {
      log.error(`Error decoding ${filePath}: ${result.error.message}. Using default configuration.`);
      return new UserConfigStore(filePath, { ...DEFAULT_CONFIG });
    }

    const parsed = userConfigSchema.safeParse(result.value);
    if (!parsed.success) {
      log.error(`Invalid user configuration in ${filePath}. Using default configuration.`);
      return new UserConfigStore(filePath, { ...DEFAULT_CONFIG });
    }
    return new UserConfigStore(filePath, parsed.data);
  }

  getRiskProfile(): RiskProfile {
    return this.config.risk_profile;
  }

  /**
   * Persist a new risk profile. Returns false (and saves nothing) for an
   * unknown level.
   */
  async setRiskProfile(level: string): Promise<boolean> {
    if (!isRiskProfile(level)) {
      log.warn(`Invalid risk level "${level}". Must be one of ${RISK_PROFILES.join(', ')}.`);
      return false;
    }
    this.config = { ...this.config, risk_profile: level };
    await this.save();
    log.info(`Risk profile set to ${level}`);
    return true;
  }

  private async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.config);
  }
}

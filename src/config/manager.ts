/**
 * Configuration management - reads .repotree.json from the working directory
 * Uses neverthrow Result types for error handling
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ResultAsync, ok, err } from 'neverthrow';
import {
  type RepoTreeConfig,
  type ResolvedConfig,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  validateConfig,
  mergeConfigs,
} from './schema.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ConfigResult<T> = Result<T, ConfigError>;

export class ConfigManager {
  private configPath: string;

  constructor(
    workDir: string,
    private readonly warn: (message: string) => void = console.warn
  ) {
    this.configPath = join(workDir, CONFIG_FILE_NAME);
  }

  /**
   * Load configuration, falling back to defaults when the file is missing or invalid
   */
  async load(overrides: RepoTreeConfig = {}): Promise<ResolvedConfig> {
    const fileConfig = await this.loadFromFile();

    if (fileConfig.isErr()) {
      this.warn(`${fileConfig.error.message}, using defaults`);
      return mergeConfigs(DEFAULT_CONFIG, overrides);
    }

    // Flags override the file, the file overrides the defaults
    return mergeConfigs(mergeConfigs(DEFAULT_CONFIG, fileConfig.value), overrides);
  }

  /**
   * Load configuration from .repotree.json
   */
  private async loadFromFile(): Promise<ConfigResult<RepoTreeConfig>> {
    if (!existsSync(this.configPath)) {
      return ok({});
    }

    const content = await ResultAsync.fromPromise(
      readFile(this.configPath, 'utf8'),
      (e) => new ConfigError(`Failed to read ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`)
    );
    if (content.isErr()) {
      return err(content.error);
    }

    const parsed = Result.fromThrowable(
      (text: string): unknown => JSON.parse(text),
      (e) => new ConfigError(`Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`)
    )(content.value);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    if (validateConfig(parsed.value)) {
      return ok(parsed.value);
    }

    return err(new ConfigError(`Invalid ${CONFIG_FILE_NAME} format`));
  }
}

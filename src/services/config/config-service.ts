/**
 * Configuration Service
 *
 * Loads formwork.config.yaml: the log level, per-validator message template
 * overrides, and default validation context values. A missing file yields
 * the defaults; a file that does not parse or match the schema is an error.
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { ConfigError } from '../../core/errors.js';
import { ConfigSchema, describeIssues, type FormworkConfig } from '../../core/schemas.js';
import { levelFromName, LogLevel } from '../../core/logger.js';
import type { ValidationContext } from '../../models/types.js';

export const DEFAULT_CONFIG_PATH = 'formwork.config.yaml';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ConfigService {
  private configPath: string;
  private cachedConfig: FormworkConfig | null = null;

  constructor(options: { configPath?: string } = {}) {
    this.configPath = options.configPath || DEFAULT_CONFIG_PATH;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   */
  async loadConfig(): Promise<FormworkConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string | null = null;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new ConfigError(`Cannot read ${this.configPath}`, {
          cause: error instanceof Error ? error.message : String(error)
        });
      }
    }

    this.cachedConfig = content === null ? ConfigSchema.parse({}) : this.parse(content);
    return this.cachedConfig;
  }

  private parse(content: string): FormworkConfig {
    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigError(`${this.configPath} is not valid YAML`, {
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    const result = ConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(`${this.configPath} does not match the configuration schema`, {
        issues: describeIssues(result.error)
      });
    }
    return result.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getLogLevel(): Promise<LogLevel> {
    const config = await this.loadConfig();
    return levelFromName(config.logLevel);
  }

  /**
   * Message template overrides keyed by validator name (e.g. `shorter-than`)
   */
  async getMessages(): Promise<Record<string, string>> {
    const config = await this.loadConfig();
    return config.messages;
  }

  /**
   * Default validation context, with `overrides` taking precedence
   */
  async getContext(overrides: ValidationContext = {}): Promise<ValidationContext> {
    const config = await this.loadConfig();
    return { ...config.context, ...overrides };
  }

  async saveConfig(config: FormworkConfig): Promise<void> {
    const content = yaml.stringify(config);
    await fs.writeFile(this.configPath, content, 'utf-8');
    this.cachedConfig = config;
  }
}

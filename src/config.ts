/**
 * Configuration system with YAML and JSON support plus environment overrides
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { logger, AppError, isLogLevel, type LogLevel } from './logger.js';
import {
  createCategoryTable,
  loadDefaultCategoryDefinitions,
  parseCategoryDefinitions,
  type CategoryDefinition,
} from './categories.js';
import { ConfigValidationError, describeError } from './errors.js';
import { DEFAULT_IN_PROGRESS_EXTENSIONS, DEFAULT_MAX_FILE_SIZE_BYTES } from './file-task.js';
import { MAX_CONCURRENCY, validateOrganizerOptions } from './organizer.js';
import type { OrganizerOptions } from './types.js';

export interface WatchConfig {
  debounceMs: number;
  retries: number;
}

export interface OrganizerConfig {
  downloadsPath: string | null;      // null: discover from the platform
  concurrency: number;
  maxFileSizeBytes: number;
  inProgressExtensions: string[];
  categories: CategoryDefinition[];  // order matters: first match wins
  dryRun: boolean;
  logLevel: LogLevel;
  logFile: string | null;
  watch: WatchConfig;
}

export const DEFAULT_CONFIG: OrganizerConfig = {
  downloadsPath: null,
  concurrency: 6,
  maxFileSizeBytes: DEFAULT_MAX_FILE_SIZE_BYTES,
  inProgressExtensions: [...DEFAULT_IN_PROGRESS_EXTENSIONS],
  categories: loadDefaultCategoryDefinitions(),
  dryRun: false,
  logLevel: 'info',
  logFile: null,
  watch: {
    debounceMs: 2000,
    retries: 2,
  },
};

function cloneConfig(config: OrganizerConfig): OrganizerConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: OrganizerConfig;
  private configPath: string | null;
  private loadErrors: string[] = [];
  private isDirty = false;

  constructor(configPath: string | null = null, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = this.loadConfig();
    this.applyEnvironment(env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): OrganizerConfig {
    if (!this.configPath) {
      return cloneConfig(DEFAULT_CONFIG);
    }

    if (!existsSync(this.configPath)) {
      logger.info(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let raw: unknown;

      if (this.configPath.endsWith('.json')) {
        raw = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        raw = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');

      // Merge with defaults
      return this.mergeConfig(cloneConfig(DEFAULT_CONFIG), raw ?? {});
    } catch (error) {
      const message = `Failed to load config: ${describeError(error)}`;
      this.loadErrors.push(message);
      logger.warn(message, undefined, 'ConfigManager');
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config onto defaults (user values take precedence).
   * Values of the wrong type are reported by validate() and otherwise ignored.
   */
  private mergeConfig(merged: OrganizerConfig, user: unknown): OrganizerConfig {
    if (!isRecord(user)) {
      this.loadErrors.push('Config file must contain a mapping at the top level');
      return merged;
    }

    const expectType = (key: string, expected: string): void => {
      this.loadErrors.push(`${key} must be ${expected}`);
    };

    for (const [key, value] of Object.entries(user)) {
      if (value === null || value === undefined) continue;

      switch (key) {
        case 'downloadsPath':
          if (typeof value === 'string') merged.downloadsPath = value;
          else expectType(key, 'a string');
          break;
        case 'concurrency':
        case 'maxFileSizeBytes':
          if (typeof value === 'number') merged[key] = value;
          else expectType(key, 'a number');
          break;
        case 'dryRun':
          if (typeof value === 'boolean') merged.dryRun = value;
          else expectType(key, 'a boolean');
          break;
        case 'logLevel':
          if (isLogLevel(value)) merged.logLevel = value;
          else expectType(key, 'one of debug, info, warn, error');
          break;
        case 'logFile':
          if (typeof value === 'string') merged.logFile = value;
          else expectType(key, 'a string');
          break;
        case 'inProgressExtensions':
          if (Array.isArray(value) && value.every((item: unknown) => typeof item === 'string')) {
            merged.inProgressExtensions = value.filter((item): item is string => typeof item === 'string');
          } else {
            expectType(key, 'a list of strings');
          }
          break;
        case 'categories': {
          const { definitions, errors } = parseCategoryDefinitions(value);
          if (errors.length > 0) {
            this.loadErrors.push(...errors);
          } else {
            merged.categories = definitions;
          }
          break;
        }
        case 'watch':
          if (!isRecord(value)) {
            expectType(key, 'a mapping');
            break;
          }
          if (typeof value.debounceMs === 'number') merged.watch.debounceMs = value.debounceMs;
          if (typeof value.retries === 'number') merged.watch.retries = value.retries;
          break;
        default:
          logger.warn(`Ignoring unknown config key: ${key}`, undefined, 'ConfigManager');
      }
    }

    return merged;
  }

  private applyEnvironment(env: NodeJS.ProcessEnv): void {
    const downloadsPath = env.DOWNLOADS_PATH?.trim();
    if (downloadsPath) {
      this.config.downloadsPath = downloadsPath;
    }

    const concurrency = env.ORGANIZER_CONCURRENCY?.trim();
    if (concurrency) {
      this.config.concurrency = Number(concurrency);
    }

    const maxFileSize = env.ORGANIZER_MAX_FILE_SIZE_BYTES?.trim();
    if (maxFileSize) {
      this.config.maxFileSizeBytes = Number(maxFileSize);
    }

    const dryRun = env.ORGANIZER_DRY_RUN ? parseBoolean(env.ORGANIZER_DRY_RUN) : undefined;
    if (dryRun !== undefined) {
      this.config.dryRun = dryRun;
    }

    if (isLogLevel(env.LOG_LEVEL)) {
      this.config.logLevel = env.LOG_LEVEL;
    }

    const logFile = env.ORGANIZER_LOG_FILE?.trim();
    if (logFile) {
      this.config.logFile = logFile;
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): OrganizerConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof OrganizerConfig>(key: K): OrganizerConfig[K] {
    return this.getAll()[key];
  }

  set<K extends keyof OrganizerConfig>(key: K, value: OrganizerConfig[K]): void {
    this.config[key] = value;
    this.isDirty = true;

    logger.debug(`Config updated: ${key}`, { value }, 'ConfigManager');
  }

  /**
   * Save configuration to file
   */
  save(targetPath: string | null = this.configPath): void {
    if (!targetPath) {
      throw new Error('No config path to save to');
    }
    if (!this.isDirty && targetPath === this.configPath) return;

    mkdirSync(dirname(targetPath), { recursive: true });
    const content = targetPath.endsWith('.json')
      ? JSON.stringify(this.config, null, 2)
      : YAML.dump(this.config, { indent: 2, flowLevel: 3 });

    writeFileSync(targetPath, content);
    this.isDirty = false;

    logger.info(`Configuration saved to ${targetPath}`, undefined, 'ConfigManager');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors = [...this.loadErrors];
    const { concurrency, maxFileSizeBytes, categories, watch } = this.config;

    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      errors.push(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
    }
    if (!Number.isFinite(maxFileSizeBytes) || maxFileSizeBytes <= 0) {
      errors.push('maxFileSizeBytes must be a positive number');
    }
    if (categories.length === 0) {
      errors.push('categories must define at least one category');
    }
    if (!Number.isFinite(watch.debounceMs) || watch.debounceMs < 0) {
      errors.push('watch.debounceMs must be zero or more');
    }
    if (!Number.isInteger(watch.retries) || watch.retries < 0) {
      errors.push('watch.retries must be a non-negative integer');
    }

    return {
      valid: errors.length === 0,
      errors: Array.from(new Set(errors)),
    };
  }

  /**
   * Build the organizer options, resolving the directory when none is configured
   */
  toOrganizerOptions(resolveDirectory: () => string): OrganizerOptions {
    const { valid, errors } = this.validate();
    if (!valid) {
      throw new ConfigValidationError(errors);
    }

    const options: OrganizerOptions = {
      directory: this.config.downloadsPath ?? resolveDirectory(),
      concurrency: this.config.concurrency,
      categoryTable: createCategoryTable(this.config.categories),
      maxFileSizeBytes: this.config.maxFileSizeBytes,
      inProgressExtensions: [...this.config.inProgressExtensions],
      dryRun: this.config.dryRun,
    };

    const optionErrors = validateOrganizerOptions(options);
    if (optionErrors.length > 0) {
      throw new ConfigValidationError(optionErrors);
    }
    return options;
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config, { indent: 2, flowLevel: 3 });
  }

  /**
   * Get config file path
   */
  getPath(): string | null {
    return this.configPath;
  }
}

/**
 * Write the default configuration as a starting point for users.
 * An existing file is never replaced.
 */
export function createExampleConfig(outputPath: string = './organizer.config.yaml'): void {
  if (existsSync(outputPath)) {
    throw new AppError(
      `Config file ${outputPath} already exists; remove it or choose another path`,
      'CONFIG_EXISTS',
      409,
      { path: outputPath }
    );
  }

  const manager = new ConfigManager(null, {});
  manager.save(outputPath);
}

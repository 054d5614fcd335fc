import fs from 'fs-extra';
import { ZodError } from 'zod';
import { AppConfig, LibraryEntry, LogLevel, LoggingConfig } from './types.js';
import {
  DEFAULT_CATEGORY,
  DEFAULT_CONFIG_FILE,
  defaultLogging,
  defaultQuality,
  defaultRequiredPrograms,
} from './defaults.js';
import { PLAYLIST_FILENAME } from './constants.js';
import { configFileSchema, type ConfigFile } from '../validation/configSchemas.js';
import { ConfigurationError, ErrorCode } from '../errors/index.js';
import { getErrorMessage, isNotFoundError } from '../utils/errorHandling.js';
import { expandDirectory } from '../utils/paths.js';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Values given on the command line. They win over the environment, which
 * wins over the configuration file.
 */
export interface ConfigOverrides {
  configPath?: string;
  playlistPath?: string;
  playbackRate?: number;
  minSizeMb?: number;
  checkQuality?: boolean;
  excludeKnownBad?: boolean;
  logLevel?: string;
}

/**
 * Builds the one AppConfig a run uses. Nothing is cached: callers pass the
 * returned object to every stage.
 */
export class ConfigManager {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(overrides: ConfigOverrides = {}): Promise<AppConfig> {
    const configPath =
      overrides.configPath ?? this.getOptionalString('REEL_SHUFFLE_CONFIG') ?? DEFAULT_CONFIG_FILE;
    const file = await this.readConfigFile(configPath);
    return this.buildConfig(file, overrides);
  }

  buildConfig(file: ConfigFile, overrides: ConfigOverrides = {}): AppConfig {
    const libraries = buildLibraryEntries(file.paths, file.patterns, file.weights, file.categories);

    const sizeFilter = {
      enabled: file.quality?.sizeFilter?.enabled ?? defaultQuality.sizeFilter.enabled,
      minSizeMb: file.quality?.sizeFilter?.minSizeMb ?? defaultQuality.sizeFilter.minSizeMb,
    };
    if (overrides.minSizeMb !== undefined) {
      sizeFilter.enabled = true;
      sizeFilter.minSizeMb = overrides.minSizeMb;
    }

    const decodeFilter = {
      enabled:
        overrides.checkQuality ||
        (file.quality?.decodeFilter?.enabled ?? defaultQuality.decodeFilter.enabled),
      decoder: file.quality?.decodeFilter?.decoder ?? defaultQuality.decodeFilter.decoder,
    };

    const playbackRate = overrides.playbackRate ?? file.playbackRate;

    return {
      requiredPrograms: file.requiredPrograms ?? [...defaultRequiredPrograms],
      libraries,
      mountedDirectories: file.mountedDirectories ?? libraries.map(entry => entry.path),
      excludeKnownBad: overrides.excludeKnownBad || (file.excludeKnownBad ?? false),
      badListDirectory: expandDirectory(
        this.getOptionalString('REEL_SHUFFLE_BAD_LIST_DIR') ?? file.badListDirectory ?? '.'
      ),
      playlistPath:
        overrides.playlistPath ??
        this.getOptionalString('REEL_SHUFFLE_PLAYLIST') ??
        file.playlistPath ??
        PLAYLIST_FILENAME,
      ...(playbackRate !== undefined && { playbackRate }),
      quality: { sizeFilter, decodeFilter },
      logging: this.buildLoggingConfig(overrides.logLevel),
    };
  }

  private async readConfigFile(configPath: string): Promise<ConfigFile> {
    let raw: unknown;
    try {
      raw = await fs.readJson(configPath);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new ConfigurationError(
          'configPath',
          `Configuration file not found: ${configPath}`,
          { service: 'config', metadata: { configPath } },
          ErrorCode.CONFIG_MISSING
        );
      }
      throw new ConfigurationError(
        'configPath',
        `Configuration file could not be read: ${getErrorMessage(error)}`,
        { service: 'config', metadata: { configPath } }
      );
    }

    try {
      return configFileSchema.parse(raw);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues.map(issue => ({
          field: issue.path.join('.'),
          message: issue.message,
        }));
        throw new ConfigurationError(
          issues[0]?.field || 'config',
          `Invalid configuration in ${configPath}: ${issues
            .map(issue => `${issue.field || '(root)'}: ${issue.message}`)
            .join('; ')}`,
          { service: 'config', metadata: { configPath, issues } }
        );
      }
      throw error;
    }
  }

  private buildLoggingConfig(levelOverride?: string): LoggingConfig {
    const level =
      levelOverride !== undefined
        ? parseLogLevel('logLevel', levelOverride)
        : this.getEnum('LOG_LEVEL', defaultLogging.level, LOG_LEVELS);

    return {
      level,
      file: {
        ...defaultLogging.file,
        enabled: this.getBoolean('LOG_FILE_ENABLED', defaultLogging.file.enabled),
        path: this.getOptionalString('LOG_FILE_PATH') ?? defaultLogging.file.path,
      },
      console: {
        ...defaultLogging.console,
        enabled: this.getBoolean('LOG_CONSOLE_ENABLED', defaultLogging.console.enabled),
      },
    };
  }

  private getOptionalString(key: string): string | undefined {
    const value = this.env[key];
    return value ? value : undefined;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (!match) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }
}

function parseLogLevel(key: string, value: string): LogLevel {
  const match = LOG_LEVELS.find(level => level === value);
  if (!match) {
    throw new ConfigurationError(key, `${key} must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}

/**
 * Zip the parallel directory lists into library entries.
 *
 * The lists must have equal lengths; a mismatch is a configuration error,
 * never a silent truncation.
 */
export function buildLibraryEntries(
  paths: Array<string | null>,
  patterns: string[],
  weights: number[],
  categories?: string[]
): LibraryEntry[] {
  const lengths = {
    patterns: patterns.length,
    weights: weights.length,
    ...(categories && { categories: categories.length }),
  };
  for (const [key, length] of Object.entries(lengths)) {
    if (length !== paths.length) {
      throw new ConfigurationError(
        key,
        `${key} has ${length} entries but paths has ${paths.length}`,
        { service: 'config' }
      );
    }
  }

  return paths.map((directory, index) => ({
    path: directory === null ? null : expandDirectory(directory),
    pattern: patterns[index],
    weight: weights[index],
    category: categories?.[index] ?? DEFAULT_CATEGORY,
  }));
}

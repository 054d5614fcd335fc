export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface SizeFilterConfig {
  enabled: boolean;
  minSizeMb: number;
}

export interface DecodeFilterConfig {
  enabled: boolean;
  decoder: string;
}

export interface QualityConfig {
  sizeFilter: SizeFilterConfig;
  decodeFilter: DecodeFilterConfig;
}

/**
 * One scanned directory. A null path keeps its slot in the configuration
 * but is skipped by every stage.
 */
export interface LibraryEntry {
  path: string | null;
  pattern: string;
  weight: number;
  category: string;
}

export interface AppConfig {
  /** First entry is the player */
  requiredPrograms: string[];
  libraries: LibraryEntry[];
  mountedDirectories: Array<string | null>;
  excludeKnownBad: boolean;
  badListDirectory: string;
  playlistPath: string;
  playbackRate?: number;
  quality: QualityConfig;
  logging: LoggingConfig;
}

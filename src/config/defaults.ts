import { LoggingConfig, QualityConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = './reel-shuffle.config.json';

export const DEFAULT_CATEGORY = 'default';

export const defaultRequiredPrograms: string[] = ['vlc'];

export const defaultQuality: QualityConfig = {
  sizeFilter: {
    enabled: false,
    minSizeMb: 1,
  },
  decodeFilter: {
    enabled: false,
    decoder: 'ffmpeg',
  },
};

export const defaultLogging: LoggingConfig = {
  level: 'info',
  file: {
    enabled: false,
    path: './logs',
    maxSize: '10',
    maxFiles: 5,
  },
  console: {
    enabled: true,
    colorize: true,
  },
};

import { AppConfig } from '../../src/config/types.js';
import { defaultLogging, defaultQuality } from '../../src/config/defaults.js';

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    requiredPrograms: ['vlc'],
    libraries: [],
    mountedDirectories: [],
    excludeKnownBad: false,
    badListDirectory: '.',
    playlistPath: 'playlist.m3u',
    quality: {
      sizeFilter: { ...defaultQuality.sizeFilter },
      decodeFilter: { ...defaultQuality.decodeFilter },
    },
    logging: defaultLogging,
    ...overrides,
  };
}

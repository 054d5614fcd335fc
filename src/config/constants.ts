/**
 * Application-wide Constants
 */

export const BYTES_PER_MB = 1024 * 1024;

export const PLAYLIST_FILENAME = 'playlist.m3u';

/**
 * File name prefixes under the bad-list directory, suffixed with the
 * upper-cased category and `.txt`
 */
export const BAD_FILES = {
  /** Maintained by hand, read in exclusion mode */
  KNOWN_BAD_PREFIX: 'known_bad_movies_',
  /** Rewritten by the decode filter on every run */
  REPORT_PREFIX: 'bad_movies_',
} as const;

/**
 * Fixed player flags, placed after the optional rate and before the playlist
 */
export const PLAYER_FLAGS = ['--fullscreen', '--random', '--loop'] as const;

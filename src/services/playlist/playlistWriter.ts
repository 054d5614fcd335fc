import fs from 'fs-extra';
import path from 'path';
import { FileWriteError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';
import { LocatedLibrary } from '../scan/movieLocator.js';

/**
 * Flatten libraries into the playlist listing, configuration order kept.
 * Each path appears `weight` times so the player's random order picks it
 * proportionally more often.
 */
export function expandWeights(libraries: LocatedLibrary[]): string[] {
  const listing: string[] = [];
  for (const library of libraries) {
    for (const movie of library.movies) {
      for (let copy = 0; copy < library.entry.weight; copy++) {
        listing.push(movie);
      }
    }
  }
  return listing;
}

/**
 * Replace the playlist with `movies`, one per line.
 * No trailing newline: splitting the file on '\n' gives back `movies`.
 */
export async function writePlaylist(playlistPath: string, movies: string[]): Promise<string> {
  const target = path.resolve(playlistPath);

  try {
    logger.debug('Removing previous playlist', { service: 'playlistWriter', playlistPath: target });
    await fs.remove(target);

    logger.info(`Creating ${path.basename(target)}`, {
      service: 'playlistWriter',
      playlistPath: target,
      entries: movies.length,
    });
    await fs.outputFile(target, movies.join('\n'), 'utf8');
  } catch (error) {
    throw new FileWriteError(
      target,
      `Failed to write playlist: ${getErrorMessage(error)}`,
      { service: 'playlistWriter', operation: 'writePlaylist' },
      error instanceof Error ? error : undefined
    );
  }

  return target;
}

import fs from 'fs-extra';
import type { Dirent } from 'fs';
import path from 'path';
import { Minimatch } from 'minimatch';
import { LibraryEntry } from '../../config/types.js';
import { DirectoryUnavailableError } from '../../errors/index.js';
import { getErrorMessage, isNotFoundError } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';
import { loadKnownBadList } from './knownBadList.js';

/**
 * Movie Locator
 *
 * Recursively finds files under a base directory whose relative path matches
 * the pattern behind a `**` globstar, so a bare file pattern matches at any
 * depth. Symlinked files are included; symlinked directories are not
 * descended into.
 */

/**
 * Movies found for one configured library entry
 */
export interface LocatedLibrary {
  entry: LibraryEntry & { path: string };
  movies: string[];
}

export interface LocateOptions {
  excludeKnownBad: boolean;
  badListDirectory: string;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

async function isRegularFile(fullPath: string): Promise<boolean> {
  try {
    return (await fs.stat(fullPath)).isFile();
  } catch {
    // Dangling symlink
    return false;
  }
}

async function walk(
  baseDirectory: string,
  directory: string,
  matcher: Minimatch,
  found: string[]
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (directory === baseDirectory) {
      throw error;
    }
    logger.warn('Skipping unreadable directory', {
      service: 'movieLocator',
      directory,
      error: getErrorMessage(error),
    });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);

    if (entry.isDirectory()) {
      await walk(baseDirectory, fullPath, matcher, found);
      continue;
    }

    const isFile = entry.isFile() || (entry.isSymbolicLink() && (await isRegularFile(fullPath)));
    if (isFile && matcher.match(toPosix(path.relative(baseDirectory, fullPath)))) {
      found.push(fullPath);
    }
  }
}

/**
 * All files under `baseDirectory` matching `pattern`, as absolute paths
 */
export async function findMovies(baseDirectory: string, pattern: string): Promise<string[]> {
  const root = path.resolve(baseDirectory);
  const matcher = new Minimatch(`**/${pattern}`, { dot: true });
  const found: string[] = [];

  try {
    await walk(root, root, matcher, found);
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new DirectoryUnavailableError(root, undefined, {
        service: 'movieLocator',
        operation: 'findMovies',
      });
    }
    throw error;
  }

  logger.debug('Found movies', {
    service: 'movieLocator',
    baseDirectory: root,
    pattern,
    count: found.length,
  });
  return found;
}

/**
 * Matches minus the category's known-bad list, in discovery order.
 * A missing list is fatal; there is no unfiltered fallback.
 */
export async function findMoviesExcludingKnownBad(
  baseDirectory: string,
  pattern: string,
  category: string,
  badListDirectory: string
): Promise<string[]> {
  const knownBad = await loadKnownBadList(badListDirectory, category);
  const movies = await findMovies(baseDirectory, pattern);
  const remaining = movies.filter(movie => !knownBad.has(movie));

  if (remaining.length === movies.length) {
    // Several space-separated paths on one line read as a single entry
    const suspect = [...knownBad].filter(entry => /\s/.test(entry));
    if (suspect.length > 0) {
      logger.warn('Known-bad entries containing whitespace matched no movie; the list takes one path per line', {
        service: 'movieLocator',
        category,
        entries: suspect,
      });
    }
  }

  logger.info('Excluded known-bad movies', {
    service: 'movieLocator',
    baseDirectory,
    category,
    excluded: movies.length - remaining.length,
  });
  return remaining;
}

/**
 * Locate movies for every configured entry. Null entries contribute nothing.
 */
export async function locateMovies(
  entries: LibraryEntry[],
  options: LocateOptions
): Promise<LocatedLibrary[]> {
  const libraries: LocatedLibrary[] = [];

  for (const entry of entries) {
    const basePath = entry.path;
    if (basePath === null) {
      continue;
    }

    logger.info(`Searching for movies in ${basePath}`, {
      service: 'movieLocator',
      pattern: entry.pattern,
      category: entry.category,
    });

    const movies = options.excludeKnownBad
      ? await findMoviesExcludingKnownBad(basePath, entry.pattern, entry.category, options.badListDirectory)
      : await findMovies(basePath, entry.pattern);

    libraries.push({ entry: { ...entry, path: basePath }, movies });
  }

  return libraries;
}

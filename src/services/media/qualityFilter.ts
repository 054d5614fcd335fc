import fs from 'fs-extra';
import { BYTES_PER_MB } from '../../config/constants.js';
import { AppConfig } from '../../config/types.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';
import { writeBadMovieReport } from '../scan/knownBadList.js';
import { LocatedLibrary } from '../scan/movieLocator.js';
import { FrameProbe, createFrameProbe } from './ffmpegService.js';

/**
 * Quality Filter
 *
 * Two optional filters, both off by default. The size filter drops files
 * below a threshold; the decode filter drops files whose first video frame
 * cannot be decoded and records them in the category's bad-movie report.
 */

export interface BadMovie {
  path: string;
  reason: string;
}

export interface DecodeFilterResult {
  kept: string[];
  bad: BadMovie[];
  reportPath: string;
}

export interface FilteredLibrary extends LocatedLibrary {
  rejected: number;
}

export function minSizeBytes(minSizeMb: number): number {
  return minSizeMb * BYTES_PER_MB;
}

/**
 * Keep files of at least `minSizeMb` megabytes (boundary inclusive)
 */
export async function filterBySize(paths: string[], minSizeMb: number = 1): Promise<string[]> {
  const threshold = minSizeBytes(minSizeMb);
  const kept: string[] = [];

  for (const filePath of paths) {
    try {
      const stats = await fs.stat(filePath);
      if (stats.size >= threshold) {
        kept.push(filePath);
      }
    } catch (error) {
      logger.warn('Dropping file that could not be stat\'ed', {
        service: 'qualityFilter',
        filePath,
        error: getErrorMessage(error),
      });
    }
  }

  logger.debug('Size filter applied', {
    service: 'qualityFilter',
    minSizeMb,
    before: paths.length,
    after: kept.length,
  });
  return kept;
}

/**
 * Probe every file in order, splitting them into kept and bad
 */
async function probeMovies(
  paths: string[],
  probe: FrameProbe
): Promise<{ kept: string[]; bad: BadMovie[] }> {
  const kept: string[] = [];
  const bad: BadMovie[] = [];

  for (const filePath of paths) {
    const result = await probe(filePath);
    if (result.ok) {
      kept.push(filePath);
    } else {
      logger.warn('Bad movie', { service: 'qualityFilter', filePath, reason: result.reason });
      bad.push({ path: filePath, reason: result.reason });
    }
  }

  return { kept, bad };
}

/**
 * Probe every file, then replace the category's report with the failures.
 * The report is written even when nothing failed.
 */
export async function filterByDecode(
  paths: string[],
  options: { category: string; reportDirectory: string; probe: FrameProbe }
): Promise<DecodeFilterResult> {
  const { kept, bad } = await probeMovies(paths, options.probe);

  const reportPath = await writeBadMovieReport(
    options.reportDirectory,
    options.category,
    bad.map(movie => movie.path)
  );

  return { kept, bad, reportPath };
}

/**
 * Decode-filter every category's files and return the ones that passed
 */
async function decodeByCategory(
  libraries: LocatedLibrary[],
  candidates: string[][],
  reportDirectory: string,
  probe: FrameProbe
): Promise<Set<string>> {
  const byCategory = new Map<string, Set<string>>();
  libraries.forEach((library, index) => {
    const paths = byCategory.get(library.entry.category) ?? new Set<string>();
    candidates[index].forEach(movie => paths.add(movie));
    byCategory.set(library.entry.category, paths);
  });

  const decodable = new Set<string>();
  for (const [category, paths] of byCategory) {
    const { kept } = await filterByDecode([...paths], { category, reportDirectory, probe });
    kept.forEach(movie => decodable.add(movie));
  }
  return decodable;
}

/**
 * Run the enabled filters over each library: size first, then decode.
 * The decode filter runs once per category over the files of all its
 * libraries, so libraries sharing a category share one report and a file
 * listed twice is probed once.
 */
export async function applyQualityFilters(
  libraries: LocatedLibrary[],
  config: Pick<AppConfig, 'quality' | 'badListDirectory'>,
  probe: FrameProbe = createFrameProbe(config.quality.decodeFilter.decoder)
): Promise<FilteredLibrary[]> {
  const { sizeFilter, decodeFilter } = config.quality;

  const sized: string[][] = [];
  for (const library of libraries) {
    sized.push(sizeFilter.enabled ? await filterBySize(library.movies, sizeFilter.minSizeMb) : library.movies);
  }

  const decodable = decodeFilter.enabled
    ? await decodeByCategory(libraries, sized, config.badListDirectory, probe)
    : null;

  return libraries.map((library, index) => {
    const movies = decodable ? sized[index].filter(movie => decodable.has(movie)) : sized[index];
    return { ...library, movies, rejected: library.movies.length - movies.length };
  });
}

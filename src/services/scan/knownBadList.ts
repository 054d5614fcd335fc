import fs from 'fs-extra';
import path from 'path';
import { BAD_FILES } from '../../config/constants.js';
import { ExclusionListMissingError } from '../../errors/index.js';
import { isNotFoundError } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';

/**
 * Known-bad lists and bad-movie reports, one of each per category.
 *
 * The known-bad list is maintained by hand and only ever read. The report is
 * written by the decode filter. They are different files.
 */

export function knownBadListPath(directory: string, category: string): string {
  return path.join(directory, `${BAD_FILES.KNOWN_BAD_PREFIX}${category.toUpperCase()}.txt`);
}

export function badMovieReportPath(directory: string, category: string): string {
  return path.join(directory, `${BAD_FILES.REPORT_PREFIX}${category.toUpperCase()}.txt`);
}

/**
 * One path per line. Blank lines and surrounding whitespace are ignored;
 * whitespace inside a line is kept so paths with spaces survive.
 */
export function parsePathList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export async function loadKnownBadList(directory: string, category: string): Promise<Set<string>> {
  const listPath = knownBadListPath(directory, category);

  let content: string;
  try {
    content = await fs.readFile(listPath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ExclusionListMissingError(listPath, category, { operation: 'loadKnownBadList' });
    }
    throw error;
  }

  const entries = new Set(parsePathList(content));
  logger.debug('Loaded known-bad list', {
    service: 'knownBadList',
    category,
    listPath,
    count: entries.size,
  });
  return entries;
}

/**
 * Replace the category's report with this run's bad paths
 */
export async function writeBadMovieReport(
  directory: string,
  category: string,
  badPaths: string[]
): Promise<string> {
  const reportPath = badMovieReportPath(directory, category);
  await fs.outputFile(reportPath, badPaths.join('\n'), 'utf8');
  logger.info('Wrote bad-movie report', {
    service: 'knownBadList',
    category,
    reportPath,
    count: badPaths.length,
  });
  return reportPath;
}

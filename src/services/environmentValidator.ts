import fs from 'fs-extra';
import { logger } from '../utils/logging.js';
import { checkRequiredPrograms } from '../utils/binaryCheck.js';
import { expandDirectory } from '../utils/paths.js';
import { DirectoryUnavailableError } from '../errors/index.js';
import { AppConfig } from '../config/types.js';

/**
 * Environment Validator
 *
 * Fatal preconditions checked before scanning: required programs on PATH and
 * configured directories present (network shares mounted).
 */

/**
 * Check each configured directory exists, skipping null entries.
 * Throws on the first missing directory.
 */
export async function checkDirectoriesMounted(directories: Array<string | null>): Promise<void> {
  for (const directory of directories) {
    if (directory === null) {
      continue;
    }

    const resolved = expandDirectory(directory);
    if (!(await fs.pathExists(resolved))) {
      logger.error('Configured directory not found', {
        service: 'environmentValidator',
        directory,
        resolved,
      });
      throw new DirectoryUnavailableError(directory, undefined, {
        service: 'environmentValidator',
        operation: 'checkDirectoriesMounted',
        metadata: { resolved },
      });
    }
  }

  logger.debug('All configured directories available', {
    service: 'environmentValidator',
    count: directories.filter(directory => directory !== null).length,
  });
}

/**
 * Programs that must resolve: the configured ones, plus the decoder when the
 * decode filter will run
 */
export function programsToCheck(config: AppConfig): string[] {
  const programs = [...config.requiredPrograms];
  const decoder = config.quality.decodeFilter.decoder;
  if (config.quality.decodeFilter.enabled && !programs.includes(decoder)) {
    programs.push(decoder);
  }
  return programs;
}

export async function validateEnvironment(
  config: AppConfig,
  searchPath?: string
): Promise<void> {
  await checkRequiredPrograms(programsToCheck(config), searchPath);
  await checkDirectoriesMounted(config.mountedDirectories);
}

/**
 * Binary Availability Checker
 *
 * Verifies that required external binaries resolve on the executable search
 * path before any scanning starts. A missing binary is fatal.
 */

import fs from 'fs-extra';
import path from 'path';
import { logger } from './logging.js';
import { MissingProgramError } from '../errors/index.js';

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  resolvedPath?: string;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate an executable the way a shell would
 *
 * @param searchPath - PATH-style list of directories
 * @returns Absolute path of the first match, or null
 */
export async function resolveExecutable(
  binaryName: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  const extensions =
    process.platform === 'win32'
      ? ['', ...(process.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
      : [''];

  // Names with a directory part are not looked up on PATH
  if (binaryName.includes('/') || binaryName.includes(path.sep)) {
    for (const extension of extensions) {
      const candidate = path.resolve(binaryName + extension);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  const directories = searchPath.split(path.delimiter).filter(directory => directory.length > 0);
  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = path.resolve(directory, binaryName + extension);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

async function checkBinary(binaryName: string, searchPath?: string): Promise<BinaryCheckResult> {
  const resolvedPath = await resolveExecutable(binaryName, searchPath);
  return resolvedPath
    ? { binary: binaryName, available: true, resolvedPath }
    : { binary: binaryName, available: false };
}

/**
 * Check required binaries in order, failing on the first one missing
 */
export async function checkRequiredPrograms(
  programs: string[],
  searchPath?: string
): Promise<BinaryCheckResult[]> {
  logger.debug('Checking binary dependencies...', { service: 'binaryCheck', programs });

  const results: BinaryCheckResult[] = [];

  for (const program of programs) {
    const result = await checkBinary(program, searchPath);

    if (!result.available) {
      logger.error(`✗ ${program} not found`, {
        service: 'binaryCheck',
        binary: program,
      });
      throw new MissingProgramError(program, { operation: 'checkRequiredPrograms' });
    }

    logger.debug(`✓ ${program} found`, {
      service: 'binaryCheck',
      binary: program,
      resolvedPath: result.resolvedPath,
    });
    results.push(result);
  }

  logger.info(`All ${results.length} required binaries available`, { service: 'binaryCheck' });
  return results;
}

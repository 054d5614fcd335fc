import { Command, InvalidArgumentError } from 'commander';
import { ConfigOverrides } from './config/ConfigManager.js';
import { ApplicationError } from './errors/index.js';
import { createErrorLogContext } from './utils/errorHandling.js';
import { logger } from './utils/logging.js';

export type CliOptions = {
  config?: string;
  playlist?: string;
  rate?: number;
  minSize?: number;
  checkQuality?: boolean;
  excludeKnownBad?: boolean;
  play: boolean;
  logLevel?: string;
};

export type CliAction = (overrides: ConfigOverrides, play: boolean) => Promise<void>;

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Map parsed options onto configuration overrides. Flags that were not given
 * stay undefined so the configuration file and environment still apply.
 */
export function toConfigOverrides(options: CliOptions): ConfigOverrides {
  return {
    ...(options.config !== undefined && { configPath: options.config }),
    ...(options.playlist !== undefined && { playlistPath: options.playlist }),
    ...(options.rate !== undefined && { playbackRate: options.rate }),
    ...(options.minSize !== undefined && { minSizeMb: options.minSize }),
    ...(options.checkQuality && { checkQuality: true }),
    ...(options.excludeKnownBad && { excludeKnownBad: true }),
    ...(options.logLevel !== undefined && { logLevel: options.logLevel }),
  };
}

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('reel-shuffle')
    .description('Scan video directories, write a weighted playlist and play it in random order')
    .option('-c, --config <path>', 'configuration file')
    .option('--playlist <path>', 'playlist file to write')
    .option('--rate <number>', 'playback rate passed to the player', parsePositiveNumber)
    .option('--min-size <mb>', 'drop files smaller than this many megabytes', parsePositiveNumber)
    .option('--check-quality', 'decode one frame of every file and drop the ones that fail')
    .option('--exclude-known-bad', 'skip files listed in the known-bad list of their category')
    .option('--no-play', 'write the playlist without launching the player')
    .option('--log-level <level>', 'error, warn, info or debug')
    .action(async () => {
      const options = program.opts<CliOptions>();
      await action(toConfigOverrides(options), options.play);
    });

  return program;
}

/**
 * Log a failed run and set a non-zero exit code. The process ends once
 * pending log writes have finished.
 */
export function reportFailure(error: unknown): void {
  logger.error(
    'Run aborted',
    error instanceof ApplicationError ? error.toJSON() : createErrorLogContext(error)
  );
  process.exitCode = 1;
}

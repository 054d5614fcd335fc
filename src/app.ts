import { AppConfig } from './config/types.js';
import { validateEnvironment } from './services/environmentValidator.js';
import { locateMovies } from './services/scan/movieLocator.js';
import { FilteredLibrary, applyQualityFilters } from './services/media/qualityFilter.js';
import { FrameProbe } from './services/media/ffmpegService.js';
import { expandWeights, writePlaylist } from './services/playlist/playlistWriter.js';
import { LaunchResult, launchPlayer } from './services/players/playerLauncher.js';
import { logger } from './utils/logging.js';
import { timeStage } from './utils/stageTimer.js';

/**
 * Shuffle pipeline
 *
 * Validate -> Locate -> (Filter) -> Write -> Launch, strictly in that order.
 * Any stage failing aborts the run; nothing is retried or skipped.
 */

export interface ShuffleOptions {
  /** Write the playlist but do not start the player */
  play?: boolean;
  /** PATH used to resolve required programs */
  searchPath?: string;
  probe?: FrameProbe;
  launch?: typeof launchPlayer;
}

export interface ShuffleSummary {
  playlistPath: string;
  /** Lines in the playlist, weights applied */
  entries: number;
  uniqueMovies: number;
  /** Files dropped by the quality filters */
  rejected: number;
  launched: boolean;
  launch?: LaunchResult;
}

export async function runShuffle(config: AppConfig, options: ShuffleOptions = {}): Promise<ShuffleSummary> {
  await timeStage('validate', () => validateEnvironment(config, options.searchPath));

  const located = await timeStage('locate', () =>
    locateMovies(config.libraries, {
      excludeKnownBad: config.excludeKnownBad,
      badListDirectory: config.badListDirectory,
    })
  );

  const { sizeFilter, decodeFilter } = config.quality;
  const filtered: FilteredLibrary[] =
    sizeFilter.enabled || decodeFilter.enabled
      ? await timeStage('filter', () => applyQualityFilters(located, config, options.probe))
      : located.map(library => ({ ...library, rejected: 0 }));

  const listing = expandWeights(filtered);
  const uniqueMovies = new Set(listing).size;
  if (listing.length === 0) {
    logger.warn('No movies found; the playlist will be empty', { service: 'pipeline' });
  }

  const playlistPath = await timeStage('write', () => writePlaylist(config.playlistPath, listing));

  const summary: ShuffleSummary = {
    playlistPath,
    entries: listing.length,
    uniqueMovies,
    rejected: filtered.reduce((sum, library) => sum + library.rejected, 0),
    launched: false,
  };

  if (options.play === false) {
    logger.info('Playback disabled, not launching the player', { service: 'pipeline', playlistPath });
    return summary;
  }

  // The first required program is the player
  const [player] = config.requiredPrograms;
  const launch = options.launch ?? launchPlayer;
  const result = await timeStage('launch', () => launch(player, playlistPath, config.playbackRate));

  return { ...summary, launched: true, launch: result };
}

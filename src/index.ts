#!/usr/bin/env node
import dotenv from 'dotenv';
import { createProgram, reportFailure } from './cli.js';
import { runShuffle } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { initializeLogger, logger } from './utils/logging.js';

dotenv.config();

const program = createProgram(async (overrides, play) => {
  const config = await new ConfigManager().load(overrides);
  initializeLogger(config.logging);

  const summary = await runShuffle(config, { play });
  logger.info('Playlist ready', {
    playlistPath: summary.playlistPath,
    entries: summary.entries,
    uniqueMovies: summary.uniqueMovies,
    rejected: summary.rejected,
    launched: summary.launched,
  });
});

program.parseAsync(process.argv).catch(reportFailure);

import { spawn } from 'child_process';
import fs from 'fs-extra';
import { PLAYER_FLAGS } from '../../config/constants.js';
import { PlaylistMissingError } from '../../errors/index.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';

/**
 * Player Launcher
 *
 * Starts the media player on the playlist and returns immediately. The tool
 * does not wait for the player, check its exit code or keep it alive.
 */

export interface LaunchResult {
  player: string;
  args: string[];
  pid?: number;
}

/**
 * `[--rate R] --fullscreen --random --loop <playlist>`
 */
export function buildPlayerArgs(playlistPath: string, playbackRate?: number): string[] {
  const args: string[] = [];
  if (playbackRate !== undefined) {
    args.push('--rate', String(playbackRate));
  }
  args.push(...PLAYER_FLAGS, playlistPath);
  return args;
}

export async function launchPlayer(
  player: string,
  playlistPath: string,
  playbackRate?: number
): Promise<LaunchResult> {
  if (!(await fs.pathExists(playlistPath))) {
    throw new PlaylistMissingError(playlistPath, { operation: 'launchPlayer' });
  }

  const args = buildPlayerArgs(playlistPath, playbackRate);
  logger.info(`Launching ${player}`, {
    service: 'playerLauncher',
    player,
    args,
  });

  const child = spawn(player, args, {
    detached: true,
    stdio: 'ignore',
    windowsHide: false,
  });

  // spawn reports a missing binary asynchronously, after this function returns
  child.on('error', (error: Error) => {
    logger.error(`Failed to launch ${player}`, createErrorLogContext(error, { service: 'playerLauncher' }));
  });
  child.unref();

  return { player, args, ...(child.pid !== undefined && { pid: child.pid }) };
}

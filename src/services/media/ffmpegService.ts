import { execFile } from 'child_process';
import { logger } from '../../utils/logging.js';
import { ProcessError } from '../../errors/index.js';

/**
 * FFmpeg Frame Check
 *
 * Opens a video with the decoder and decodes exactly one video frame,
 * writing its checksum to stdout. Decodes a full frame per file, so it is
 * slow on large libraries and only runs when enabled.
 */

export type DecodeResult = { ok: true } | { ok: false; reason: string };

/**
 * Classifies one file; injected into the decode filter
 */
export type FrameProbe = (filePath: string) => Promise<DecodeResult>;

export const DEFAULT_DECODER = 'ffmpeg';

export const NO_FRAME_REASON = 'no video frame decoded';

/**
 * Decoder arguments: errors only, no stdin, stop on the first decode error,
 * first video stream, one frame, framemd5 checksums on stdout.
 * The file path is a single argument, never interpolated into a shell string.
 */
export function buildDecodeArgs(filePath: string): string[] {
  return [
    '-v', 'error', '-nostdin', '-xerror',
    '-i', filePath,
    '-map', '0:v:0', '-frames:v', '1',
    '-f', 'framemd5', '-',
  ];
}

/**
 * Number of frame lines in framemd5 output; `#` lines are headers
 */
export function countDecodedFrames(stdout: string): number {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#')).length;
}

/**
 * Decode the first video frame of `filePath`.
 *
 * The file is good only when the decoder exits 0, prints nothing at the
 * `error` level and emits at least one frame checksum. ffmpeg exits 0 on a
 * corrupt frame or an empty output, so the exit code alone is not enough.
 * Failing to start the decoder at all is a ProcessError.
 */
export function decodeFirstFrame(filePath: string, decoder: string = DEFAULT_DECODER): Promise<DecodeResult> {
  const startTime = Date.now();

  return new Promise((resolve, reject) => {
    execFile(decoder, buildDecodeArgs(filePath), { windowsHide: true }, (error, stdout, stderr) => {
      const timeMs = Date.now() - startTime;

      // String codes (ENOENT, EACCES) mean the decoder never ran
      if (error && typeof error.code === 'string') {
        reject(
          new ProcessError(
            decoder,
            -1,
            `Failed to start ${decoder}: ${error.message}`,
            { service: 'ffmpeg', metadata: { filePath } },
            error
          )
        );
        return;
      }

      const detail = String(stderr).trim().split('\n')[0] ?? '';
      const frames = countDecodedFrames(String(stdout));

      if (!error && !detail && frames > 0) {
        logger.debug('Decoded first frame', { service: 'ffmpeg', filePath, timeMs });
        resolve({ ok: true });
        return;
      }

      let reason = detail;
      if (!reason && error) {
        reason = error.signal
          ? `${decoder} killed by ${error.signal}`
          : `${decoder} exited with code ${error.code ?? 'unknown'}`;
      }
      if (!reason) {
        reason = NO_FRAME_REASON;
      }

      logger.debug('Frame decode failed', { service: 'ffmpeg', filePath, reason, timeMs });
      resolve({ ok: false, reason });
    });
  });
}

export function createFrameProbe(decoder: string = DEFAULT_DECODER): FrameProbe {
  return (filePath: string) => decodeFirstFrame(filePath, decoder);
}

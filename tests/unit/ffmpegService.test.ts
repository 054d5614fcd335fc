/**
 * FFmpeg Frame Check Tests
 *
 * child_process is mocked; no decoder runs.
 */

import { execFile } from 'child_process';
import { jest } from '@jest/globals';
import {
  NO_FRAME_REASON,
  buildDecodeArgs,
  countDecodedFrames,
  createFrameProbe,
  decodeFirstFrame,
} from '../../src/services/media/ffmpegService.js';
import { ProcessError } from '../../src/errors/index.js';

jest.mock('child_process', () => ({
  execFile: jest.fn(),
}));

jest.mock('../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;
type ExecFileStub = (file: string, args: string[], options: object, callback: ExecCallback) => void;

const mockExecFile = execFile as unknown as jest.Mock<ExecFileStub>;

const FRAMEMD5_OUTPUT = [
  '#format: frame checksums',
  '#version: 2',
  '#hash: MD5',
  '#tb 0: 1/24',
  '#stream#, dts,        pts, duration,     size, hash',
  '0,          0,          0,        1,   460800, 0123456789abcdef0123456789abcdef',
  '',
].join('\n');

function respondWith(error: Error | null, stdout = '', stderr = ''): void {
  mockExecFile.mockImplementation((_file, _args, _options, callback) => {
    callback(error, stdout, stderr);
  });
}

function exitError(code: number | string): Error {
  return Object.assign(new Error('Command failed'), { code });
}

describe('ffmpegService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should request one frame checksum and stop on the first decode error', () => {
    expect(buildDecodeArgs('/movies/a.mp4')).toEqual([
      '-v', 'error', '-nostdin', '-xerror', '-i', '/movies/a.mp4',
      '-map', '0:v:0', '-frames:v', '1', '-f', 'framemd5', '-',
    ]);
  });

  it('should count frame lines and skip headers', () => {
    expect(countDecodedFrames(FRAMEMD5_OUTPUT)).toBe(1);
    expect(countDecodedFrames('#format: frame checksums\n#version: 2\n')).toBe(0);
    expect(countDecodedFrames('')).toBe(0);
  });

  it('should classify a clean exit with a frame checksum as decodable', async () => {
    respondWith(null, FRAMEMD5_OUTPUT);

    await expect(decodeFirstFrame('/movies/a.mp4')).resolves.toEqual({ ok: true });
    expect(mockExecFile).toHaveBeenCalledWith(
      'ffmpeg',
      buildDecodeArgs('/movies/a.mp4'),
      expect.any(Object),
      expect.any(Function)
    );
  });

  it('should pass a hostile file name as a single argument', async () => {
    respondWith(null, FRAMEMD5_OUTPUT);
    const hostile = '/movies/film; rm -rf $HOME.mp4';

    await decodeFirstFrame(hostile);

    const args = mockExecFile.mock.calls[0][1];
    expect(args[args.indexOf('-i') + 1]).toBe(hostile);
    expect(args).toHaveLength(13);
  });

  it('should classify a clean exit with a decode error on stderr as bad', async () => {
    respondWith(null, FRAMEMD5_OUTPUT, '[h264 @ 0x1] error while decoding MB 0 0\n');

    await expect(decodeFirstFrame('/movies/corrupt.mp4')).resolves.toEqual({
      ok: false,
      reason: '[h264 @ 0x1] error while decoding MB 0 0',
    });
  });

  it('should classify a clean exit without any frame as bad', async () => {
    respondWith(null, '#format: frame checksums\n#version: 2\n');

    await expect(decodeFirstFrame('/movies/audio-only.mp4')).resolves.toEqual({
      ok: false,
      reason: NO_FRAME_REASON,
    });
  });

  it('should classify a non-zero exit as bad, using the first stderr line', async () => {
    respondWith(exitError(1), '', '[mov,mp4] moov atom not found\n/movies/b.mp4: Invalid data\n');

    await expect(decodeFirstFrame('/movies/b.mp4')).resolves.toEqual({
      ok: false,
      reason: '[mov,mp4] moov atom not found',
    });
  });

  it('should fall back to the exit code when stderr is empty', async () => {
    respondWith(exitError(69));

    await expect(decodeFirstFrame('/movies/c.mp4')).resolves.toEqual({
      ok: false,
      reason: 'ffmpeg exited with code 69',
    });
  });

  it('should raise ProcessError when the decoder cannot start', async () => {
    respondWith(exitError('ENOENT'));

    await expect(decodeFirstFrame('/movies/d.mp4', 'avconv')).rejects.toBeInstanceOf(ProcessError);
  });

  it('should build a probe bound to the configured decoder', async () => {
    respondWith(null, FRAMEMD5_OUTPUT);

    await createFrameProbe('/opt/ffmpeg/bin/ffmpeg')('/movies/e.mp4');

    expect(mockExecFile.mock.calls[0][0]).toBe('/opt/ffmpeg/bin/ffmpeg');
  });
});

/**
 * Quality Filter Tests
 */

import fs from 'fs-extra';
import path from 'path';
import { jest } from '@jest/globals';
import {
  applyQualityFilters,
  filterByDecode,
  filterBySize,
  minSizeBytes,
} from '../../src/services/media/qualityFilter.js';
import { FrameProbe } from '../../src/services/media/ffmpegService.js';
import { LocatedLibrary } from '../../src/services/scan/movieLocator.js';
import { makeConfig } from '../utils/testConfig.js';
import { createTempDir, touch } from '../utils/tempFiles.js';

jest.mock('../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const MB = 1024 * 1024;

// Anything named broken*.mp4 fails to decode
const fakeProbe: FrameProbe = async (filePath: string) =>
  path.basename(filePath).startsWith('broken')
    ? { ok: false, reason: 'moov atom not found' }
    : { ok: true };

describe('qualityFilter', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  describe('filterBySize', () => {
    it('should convert megabytes with 1 MB = 1024 * 1024 bytes', () => {
      expect(minSizeBytes(1)).toBe(1048576);
      expect(minSizeBytes(2.5)).toBe(2621440);
    });

    it('should keep a file of exactly the threshold and drop one byte under', async () => {
      const exact = await touch(path.join(root, 'exact.mp4'), Buffer.alloc(MB));
      const under = await touch(path.join(root, 'under.mp4'), Buffer.alloc(MB - 1));
      const over = await touch(path.join(root, 'over.mp4'), Buffer.alloc(MB + 1));

      await expect(filterBySize([exact, under, over], 1)).resolves.toEqual([exact, over]);
    });

    it('should default to a 1 MB threshold', async () => {
      const small = await touch(path.join(root, 'small.mp4'), 'tiny');
      const exact = await touch(path.join(root, 'exact.mp4'), Buffer.alloc(MB));

      await expect(filterBySize([small, exact])).resolves.toEqual([exact]);
    });

    it('should drop files that no longer exist', async () => {
      await expect(filterBySize([path.join(root, 'gone.mp4')], 1)).resolves.toEqual([]);
    });
  });

  describe('filterByDecode', () => {
    it('should keep decodable files and report the rest', async () => {
      const good = path.join(root, 'good.mp4');
      const broken = path.join(root, 'broken.mp4');

      const result = await filterByDecode([good, broken], {
        category: 'default',
        reportDirectory: root,
        probe: fakeProbe,
      });

      expect(result.kept).toEqual([good]);
      expect(result.bad).toEqual([{ path: broken, reason: 'moov atom not found' }]);
      expect(result.reportPath).toBe(path.join(root, 'bad_movies_DEFAULT.txt'));
      await expect(fs.readFile(result.reportPath, 'utf8')).resolves.toBe(broken);
    });

    it('should replace a stale report', async () => {
      await touch(path.join(root, 'bad_movies_IRIS.txt'), '/old/broken.mp4\n/old/broken2.mp4');

      const result = await filterByDecode([path.join(root, 'fine.mp4')], {
        category: 'iris',
        reportDirectory: root,
        probe: fakeProbe,
      });

      await expect(fs.readFile(result.reportPath, 'utf8')).resolves.toBe('');
    });

    it('should probe files one at a time in order', async () => {
      const probed: string[] = [];
      const probe: FrameProbe = async (filePath: string) => {
        probed.push(filePath);
        return { ok: true };
      };

      await filterByDecode(['/m/1.mp4', '/m/2.mp4', '/m/3.mp4'], {
        category: 'default',
        reportDirectory: root,
        probe,
      });

      expect(probed).toEqual(['/m/1.mp4', '/m/2.mp4', '/m/3.mp4']);
    });
  });

  describe('applyQualityFilters', () => {
    const library = (category: string, movies: string[]): LocatedLibrary => ({
      entry: { path: '/movies', pattern: '*.mp4', weight: 1, category },
      movies,
    });

    it('should leave libraries untouched when both filters are disabled', async () => {
      const libraries = [library('default', ['/m/broken.mp4', '/m/missing.mp4'])];

      const filtered = await applyQualityFilters(libraries, makeConfig({ badListDirectory: root }), fakeProbe);

      expect(filtered).toEqual([{ ...libraries[0], rejected: 0 }]);
      await expect(fs.pathExists(path.join(root, 'bad_movies_DEFAULT.txt'))).resolves.toBe(false);
    });

    it('should write one report per category covering every library in it', async () => {
      const config = makeConfig({ badListDirectory: root });
      config.quality.decodeFilter.enabled = true;
      const libraries = [
        library('iris', ['/a/broken1.mp4', '/a/ok.mp4']),
        library('default', ['/b/ok.mp4']),
        library('iris', ['/c/broken2.mp4']),
      ];

      const filtered = await applyQualityFilters(libraries, config, fakeProbe);

      expect(filtered.map(entry => entry.movies)).toEqual([['/a/ok.mp4'], ['/b/ok.mp4'], []]);
      expect(filtered.map(entry => entry.rejected)).toEqual([1, 0, 1]);
      await expect(fs.readFile(path.join(root, 'bad_movies_IRIS.txt'), 'utf8')).resolves.toBe(
        '/a/broken1.mp4\n/c/broken2.mp4'
      );
      await expect(fs.readFile(path.join(root, 'bad_movies_DEFAULT.txt'), 'utf8')).resolves.toBe('');
    });

    it('should probe and report a file shared by two libraries of one category once', async () => {
      const probe = jest.fn(fakeProbe);
      const config = makeConfig({ badListDirectory: root });
      config.quality.decodeFilter.enabled = true;
      const libraries = [
        library('iris', ['/shared/broken.mp4', '/a/ok.mp4']),
        library('iris', ['/shared/broken.mp4', '/b/ok.mp4']),
      ];

      const filtered = await applyQualityFilters(libraries, config, probe);

      expect(probe).toHaveBeenCalledTimes(3);
      expect(filtered.map(entry => entry.movies)).toEqual([['/a/ok.mp4'], ['/b/ok.mp4']]);
      expect(filtered.map(entry => entry.rejected)).toEqual([1, 1]);
      await expect(fs.readFile(path.join(root, 'bad_movies_IRIS.txt'), 'utf8')).resolves.toBe(
        '/shared/broken.mp4'
      );
    });

    it('should run the size filter before the decode filter', async () => {
      const small = await touch(path.join(root, 'broken-small.mp4'), 'tiny');
      const large = await touch(path.join(root, 'large.mp4'), Buffer.alloc(MB));
      const probe = jest.fn(fakeProbe);
      const config = makeConfig({ badListDirectory: root });
      config.quality.sizeFilter.enabled = true;
      config.quality.decodeFilter.enabled = true;

      const filtered = await applyQualityFilters([library('default', [small, large])], config, probe);

      expect(filtered[0].movies).toEqual([large]);
      expect(probe).toHaveBeenCalledTimes(1);
      expect(probe).toHaveBeenCalledWith(large);
      await expect(fs.readFile(path.join(root, 'bad_movies_DEFAULT.txt'), 'utf8')).resolves.toBe('');
    });
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, promises as fsPromises } from 'fs';
import os from 'os';
import path from 'path';
import { gzipSync } from 'zlib';
import { DecompressionService } from './DecompressionService.js';
import { CleanupError, DecompressionError } from '../utils/errorHandler.js';

describe('DecompressionService', () => {
  let root: string;

  beforeEach(async () => {
    root = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'sweep-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fsPromises.rm(root, { recursive: true, force: true });
  });

  async function writeFile(relative: string, data: Buffer | string): Promise<string> {
    const filePath = path.join(root, relative);
    await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
    await fsPromises.writeFile(filePath, data);
    return filePath;
  }

  describe('planSweep', () => {
    it('should plan every match, including one whose output already exists', () => {
      const plan = DecompressionService.planSweep(
        ['/r/a.json.gz', '/r/a.txt', '/r/b.json', '/r/b.json.gz'],
        '.json.gz',
        '.gz'
      );

      expect(plan).toEqual([
        { path: '/r/a.json.gz', outputPath: '/r/a.json' },
        { path: '/r/b.json.gz', outputPath: '/r/b.json' },
      ]);
    });

    it('should plan nothing when no file matches', () => {
      expect(DecompressionService.planSweep(['/r/a.json', '/r/notes.gz'], '.json.gz', '.gz')).toEqual([]);
    });
  });

  describe('sweep', () => {
    it('should decompress nested matches and remove the originals', async () => {
      const nested = await writeFile('2025/10/01/00/a.json.gz', gzipSync('{"id":1}\n'));
      const top = await writeFile('b.json.gz', gzipSync('{"id":2}\n'));
      const notes = await writeFile('notes.txt', 'leave me alone');

      const outcomes = await new DecompressionService().sweep(root);

      expect(outcomes).toEqual([
        {
          path: nested,
          outputPath: path.join(root, '2025/10/01/00/a.json'),
          status: 'decompressed',
          bytesWritten: 9,
        },
        { path: top, outputPath: path.join(root, 'b.json'), status: 'decompressed', bytesWritten: 9 },
      ]);
      await expect(fsPromises.readFile(path.join(root, '2025/10/01/00/a.json'), 'utf8')).resolves.toBe('{"id":1}\n');
      await expect(fsPromises.readFile(path.join(root, 'b.json'), 'utf8')).resolves.toBe('{"id":2}\n');
      expect(existsSync(nested)).toBe(false);
      expect(existsSync(top)).toBe(false);
      await expect(fsPromises.readFile(notes, 'utf8')).resolves.toBe('leave me alone');
    });

    it('should do nothing on a second run', async () => {
      await writeFile('a.json.gz', gzipSync('{"id":1}\n'));
      const service = new DecompressionService();
      await service.sweep(root);

      const second = await service.sweep(root);

      expect(second).toEqual([]);
      expect((await fsPromises.readdir(root)).sort()).toEqual(['a.json']);
    });

    it('should keep the original and write no output when the stream is truncated', async () => {
      const compressed = gzipSync(Buffer.from(JSON.stringify({ values: Array.from({ length: 200 }, (_, i) => i) })));
      const truncated = compressed.subarray(0, compressed.length - 12);
      const broken = await writeFile('broken.json.gz', truncated);

      const [outcome] = await new DecompressionService().sweep(root);

      expect(outcome.status).toBe('failed');
      expect(outcome.error).toBeInstanceOf(DecompressionError);
      expect(outcome.error?.message).toBe(`Compressed stream is truncated: ${broken}`);
      expect(await fsPromises.readdir(root)).toEqual(['broken.json.gz']);
      expect((await fsPromises.readFile(broken)).equals(truncated)).toBe(true);
    });

    it('should report data that is not gzip as corrupt', async () => {
      const bad = await writeFile('bad.json.gz', 'plain text, not compressed');

      const [outcome] = await new DecompressionService().sweep(root);

      expect(outcome.status).toBe('failed');
      expect(outcome.error?.message).toBe(`Compressed data is corrupt or not gzip: ${bad}`);
      expect(await fsPromises.readdir(root)).toEqual(['bad.json.gz']);
    });

    it('should keep both copies when the original cannot be removed, then decompress again on the next run', async () => {
      const original = await writeFile('c.json.gz', gzipSync('{"id":3}\n'));
      const output = path.join(root, 'c.json');
      vi.spyOn(fsPromises, 'unlink').mockRejectedValueOnce(
        Object.assign(new Error('EPERM: operation not permitted'), { code: 'EPERM' })
      );
      const service = new DecompressionService();

      const [first] = await service.sweep(root);

      expect(first.status).toBe('decompressed-original-kept');
      expect(first.bytesWritten).toBe(9);
      expect(first.error).toBeInstanceOf(CleanupError);
      expect(first.error?.message).toBe(`Could not remove ${original}: Permission denied: ${original}`);
      expect(existsSync(original)).toBe(true);
      await expect(fsPromises.readFile(output, 'utf8')).resolves.toBe('{"id":3}\n');

      const [second] = await service.sweep(root);

      expect(second).toEqual({ path: original, outputPath: output, status: 'decompressed', bytesWritten: 9 });
      expect(existsSync(original)).toBe(false);
      await expect(fsPromises.readFile(output, 'utf8')).resolves.toBe('{"id":3}\n');
    });

    it('should replace an output left by an earlier run with the new content', async () => {
      await writeFile('d.json', '{"v":1}');
      const original = await writeFile('d.json.gz', gzipSync('{"v":2}'));

      const outcomes = await new DecompressionService().sweep(root);

      expect(outcomes).toEqual([
        { path: original, outputPath: path.join(root, 'd.json'), status: 'decompressed', bytesWritten: 7 },
      ]);
      await expect(fsPromises.readFile(path.join(root, 'd.json'), 'utf8')).resolves.toBe('{"v":2}');
      expect(await fsPromises.readdir(root)).toEqual(['d.json']);
    });

    it('should use a configured suffix and extension', async () => {
      await writeFile('a.csv.gz', gzipSync('x,y\n'));
      await writeFile('b.json.gz', gzipSync('{}'));

      const outcomes = await new DecompressionService({ suffix: '.csv.gz', compressedExtension: '.gz' }).sweep(root);

      expect(outcomes.map((outcome) => path.basename(outcome.outputPath))).toEqual(['a.csv']);
      expect((await fsPromises.readdir(root)).sort()).toEqual(['a.csv', 'b.json.gz']);
    });

    it('should return no outcomes for a missing root', async () => {
      await expect(new DecompressionService().sweep(path.join(root, 'missing'))).resolves.toEqual([]);
    });
  });
});

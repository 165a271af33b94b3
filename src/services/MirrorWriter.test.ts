import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { MirrorWriter } from './MirrorWriter.js';
import { MirrorWriteError } from '../utils/errorHandler.js';

describe('MirrorWriter', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mirror-writer-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('resolveLocalPath', () => {
    it('should map every key segment onto a directory', () => {
      expect(MirrorWriter.resolveLocalPath('/data/mirror', 'miner_data/2025/10/01/00/a.json.gz')).toBe(
        '/data/mirror/miner_data/2025/10/01/00/a.json.gz'
      );
    });

    it('should reject keys that climb out of the root', () => {
      expect(() => MirrorWriter.resolveLocalPath('/data/mirror', '../escape.json.gz')).toThrow(MirrorWriteError);
      expect(() => MirrorWriter.resolveLocalPath('/data/mirror', 'a/../../escape.json.gz')).toThrow(
        "Key 'a/../../escape.json.gz' has an empty, '.' or '..' segment"
      );
    });

    it('should reject keys that would collapse onto another key', () => {
      for (const key of ['a//b.json.gz', './a.json.gz', 'a/./b.json.gz', '/a.json.gz', 'a/../b.json.gz']) {
        expect(() => MirrorWriter.resolveLocalPath('/data/mirror', key)).toThrow(
          `Key '${key}' has an empty, '.' or '..' segment`
        );
      }
    });

    it('should accept names that merely start with dots', () => {
      expect(MirrorWriter.resolveLocalPath('/data/mirror', '..data.json.gz')).toBe('/data/mirror/..data.json.gz');
      expect(MirrorWriter.resolveLocalPath('/data/mirror', 'p/.hidden.json.gz')).toBe('/data/mirror/p/.hidden.json.gz');
    });

    it('should reject keys that do not name a file', () => {
      expect(() => MirrorWriter.resolveLocalPath('/data/mirror', '')).toThrow("Key '' does not name a file");
      expect(() => MirrorWriter.resolveLocalPath('/data/mirror', 'a/b/')).toThrow("Key 'a/b/' does not name a file");
    });
  });

  describe('writeObject', () => {
    it('should create parent directories and write the streamed bytes', async () => {
      const source = Readable.from([Buffer.from('hello '), Buffer.from('world')]);

      const result = await MirrorWriter.writeObject(root, 'a/b/c.json.gz', source);

      expect(result).toEqual({ localPath: path.join(root, 'a', 'b', 'c.json.gz'), bytesWritten: 11 });
      await expect(fs.readFile(result.localPath, 'utf8')).resolves.toBe('hello world');
    });

    it('should overwrite an existing file with the new content', async () => {
      await MirrorWriter.writeObject(root, 'x.json.gz', Readable.from([Buffer.from('first version')]));
      const result = await MirrorWriter.writeObject(root, 'x.json.gz', Readable.from([Buffer.from('second')]));

      await expect(fs.readFile(result.localPath, 'utf8')).resolves.toBe('second');
    });

    it('should remove the partial file when the stream breaks', async () => {
      const source = Readable.from(
        (async function* () {
          yield Buffer.from('partial');
          throw new Error('socket hang up');
        })()
      );

      await expect(MirrorWriter.writeObject(root, 'a/broken.json.gz', source)).rejects.toThrow(
        /^Stream for 'a\/broken\.json\.gz' failed after \d+ bytes: socket hang up$/
      );
      expect(existsSync(path.join(root, 'a', 'broken.json.gz'))).toBe(false);
    });

    it('should report a filesystem error when a parent path is a file', async () => {
      await fs.writeFile(path.join(root, 'blocker'), 'not a directory');
      const source = Readable.from([Buffer.from('data')]);

      const error = await MirrorWriter.writeObject(root, 'blocker/x.json.gz', source).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MirrorWriteError);
      expect(error instanceof MirrorWriteError && error.key).toBe('blocker/x.json.gz');
      expect(source.destroyed).toBe(true);
    });
  });
});

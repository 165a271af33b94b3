import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { isWithin, listFiles } from './fileTree.js';

describe('listFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'file-tree-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should list nested files in sorted order and skip empty directories', async () => {
    await fs.mkdir(path.join(root, 'b', 'c'), { recursive: true });
    await fs.mkdir(path.join(root, 'empty'));
    await fs.writeFile(path.join(root, 'b', 'c', 'deep.json'), '1');
    await fs.writeFile(path.join(root, 'a.json'), '2');
    await fs.writeFile(path.join(root, 'b', 'z.json'), '3');

    expect(await listFiles(root)).toEqual([
      path.join(root, 'a.json'),
      path.join(root, 'b', 'c', 'deep.json'),
      path.join(root, 'b', 'z.json'),
    ]);
  });

  it('should return an empty list for a missing root', async () => {
    expect(await listFiles(path.join(root, 'missing'))).toEqual([]);
  });
});

describe('isWithin', () => {
  it('should accept the root and paths below it', () => {
    expect(isWithin('/data/mirror', '/data/mirror')).toBe(true);
    expect(isWithin('/data/mirror/', '/data/mirror/a/b.zip')).toBe(true);
    expect(isWithin('/data/mirror', '/data/mirror/..x.zip')).toBe(true);
  });

  it('should reject parents and siblings', () => {
    expect(isWithin('/data/mirror', '/data')).toBe(false);
    expect(isWithin('/data/mirror', '/data/other/x.zip')).toBe(false);
    expect(isWithin('/data/mirror', '/data/mirror-archive.zip')).toBe(false);
  });
});

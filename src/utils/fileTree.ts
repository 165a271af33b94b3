import { Dirent, promises as fs } from 'fs';
import path from 'path';
import { ErrorHandler, errorCode } from './errorHandler.js';

/**
 * Lists every regular file below root, sorted.
 * A missing root yields an empty list; unreadable subdirectories are logged and skipped.
 */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const dirPath = pending.pop();
    if (dirPath === undefined) {
      break;
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (dirPath === root && errorCode(error) === 'ENOENT') {
        return [];
      }
      console.error(`Could not read ${dirPath}: ${ErrorHandler.describeFileSystemError(error, dirPath)}`);
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  }

  return files.sort();
}

/**
 * True when target is root itself or lies below it
 */
export function isWithin(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { FileEntry, ListFilesOptions } from './types';

/**
 * Order paths segment by segment, comparing code units, so `a/b` sorts before
 * `a.txt` and the result does not depend on the host locale.
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

export class FilesystemTree {
  constructor(private readonly rootPath: string) {}

  getRootPath(): string {
    return this.rootPath;
  }

  /** Every regular file below the root. Symbolic links are not followed or listed. */
  async listFiles(options: ListFilesOptions = {}): Promise<FileEntry[]> {
    const pruned = new Set(options.pruneDirectories ?? []);
    const entries: FileEntry[] = [];
    await this.walkDirectory('.', pruned, entries);
    return entries.sort((a, b) => comparePaths(a.path, b.path));
  }

  private async walkDirectory(relativeDir: string, pruned: Set<string>, entries: FileEntry[]): Promise<void> {
    const absoluteDir = join(this.rootPath, relativeDir);
    const dirEntries = await readdir(absoluteDir, { withFileTypes: true });

    for (const entry of dirEntries) {
      const relPath = relativeDir === '.' ? entry.name : `${relativeDir}/${entry.name}`;
      if (entry.isDirectory()) {
        if (!pruned.has(relPath)) {
          await this.walkDirectory(relPath, pruned, entries);
        }
      } else if (entry.isFile()) {
        entries.push({ path: relPath, name: entry.name });
      }
    }
  }
}

export interface ListFilesOptions {
  /** Relative directory paths (with `/` separators) that are not descended into. */
  pruneDirectories?: string[];
}

export interface FileEntry {
  /** Path relative to the root, always with `/` separators. */
  path: string;
  name: string;
}

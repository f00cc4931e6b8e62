import type { FileProcessingError } from '../common/errors';

export interface SanitizerConfig {
  readonly sourceDir: string;
  readonly outputDir: string;
  readonly rulesFile: string;
  /** Absent, or pointing at a missing file, disables ignoring. */
  readonly ignoreFile?: string;
  readonly placeholder: string;
  readonly maintainLength: boolean;
  readonly concurrency: number;
  readonly dryRun: boolean;
}

export interface ScrubOptions {
  placeholder: string;
  maintainLength: boolean;
}

export interface FileTask {
  /** Path relative to the source root, always with `/` separators. */
  readonly relativePath: string;
  readonly sourcePath: string;
  readonly destinationPath: string;
}

export type FileOutcome =
  | { status: 'sanitized'; task: FileTask; appliedRules: string[] }
  | { status: 'failed'; task: FileTask; error: FileProcessingError };

export interface FileFailure {
  path: string;
  message: string;
}

export interface SanitizeReport {
  processed: number;
  failed: number;
  ignored: number;
  rules: number;
  ignorePatterns: number;
  dryRun: boolean;
  durationMs: number;
  files: string[];
  failures: FileFailure[];
}

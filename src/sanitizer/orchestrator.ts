import { mkdir, stat } from 'node:fs/promises';
import { isAbsolute, join, relative, sep } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ConfigError, describeError } from '../common/errors';
import { IgnoreMatcher } from '../common/ignore';
import { getLogger } from '../common/logger';
import { FilesystemTree } from '../ingest/filesystem';
import { recordSanitizeMetrics } from '../observability/metrics';
import { withSpan } from '../observability/tracing';
import { loadRuleSet } from '../rules/loader';
import type { RuleSet } from '../rules/types';
import { processFile } from './pipeline';
import type { FileOutcome, FileTask, SanitizeReport, SanitizerConfig } from './types';

const log = getLogger('sanitizer');

export interface SourceListing {
  tasks: FileTask[];
  ignored: string[];
}

/**
 * Sanitizes every file of a source tree into a mirrored output tree. The rule
 * set and ignore matcher are loaded once and shared read-only by all workers.
 */
export class LogSanitizer {
  private constructor(
    readonly config: SanitizerConfig,
    readonly ruleSet: RuleSet,
    readonly ignoreMatcher: IgnoreMatcher,
  ) {}

  /**
   * Configuration errors (missing source directory, rules file, invalid or
   * empty rule set) reject here, before any tree is touched.
   */
  static async create(config: SanitizerConfig): Promise<LogSanitizer> {
    await assertDirectory(config.sourceDir);
    const ruleSet = await loadRuleSet(config.rulesFile);
    const ignoreMatcher = await IgnoreMatcher.fromFile(config.ignoreFile);
    return new LogSanitizer(Object.freeze({ ...config }), ruleSet, ignoreMatcher);
  }

  async sourceFiles(): Promise<SourceListing> {
    const tree = new FilesystemTree(this.config.sourceDir);
    const entries = await tree.listFiles({ pruneDirectories: this.outputPrefix() });
    const tasks: FileTask[] = [];
    const ignored: string[] = [];

    for (const entry of entries) {
      if (this.ignoreMatcher.isIgnored(entry.path, entry.name)) {
        log.debug(`Ignoring file ${entry.path}`);
        ignored.push(entry.path);
        continue;
      }
      tasks.push(
        Object.freeze({
          relativePath: entry.path,
          sourcePath: join(this.config.sourceDir, entry.path),
          destinationPath: join(this.config.outputDir, entry.path),
        }),
      );
    }

    return { tasks, ignored };
  }

  async sanitise(): Promise<SanitizeReport> {
    return withSpan(
      'log-sanitizer.sanitise',
      {
        'sanitizer.rules': this.ruleSet.rules.length,
        'sanitizer.dry_run': this.config.dryRun,
        'sanitizer.concurrency': this.config.concurrency,
      },
      () => this.run(),
    );
  }

  private async run(): Promise<SanitizeReport> {
    const started = performance.now();
    if (!this.config.dryRun) {
      await mkdir(this.config.outputDir, { recursive: true });
    }

    const { tasks, ignored } = await this.sourceFiles();
    const outcomes = await this.runWorkers(tasks);

    const files: string[] = [];
    const failures: SanitizeReport['failures'] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'failed') {
        failures.push({ path: outcome.task.relativePath, message: outcome.error.message });
      } else {
        files.push(outcome.task.relativePath);
      }
    }

    const durationMs = Math.round((performance.now() - started) * 100) / 100;
    const report: SanitizeReport = {
      processed: files.length,
      failed: failures.length,
      ignored: ignored.length,
      rules: this.ruleSet.rules.length,
      ignorePatterns: this.ignoreMatcher.size,
      dryRun: this.config.dryRun,
      durationMs,
      files,
      failures,
    };

    recordSanitizeMetrics({
      timestamp: new Date().toISOString(),
      processed: report.processed,
      failed: report.failed,
      ignored: report.ignored,
      rules: report.rules,
      durationMs,
      dryRun: report.dryRun,
    });

    const summary = { processed: report.processed, failed: report.failed, ignored: report.ignored, durationMs };
    if (report.failed > 0) {
      log.warn(`Sanitization finished with ${report.failed} failed files`, summary);
    } else {
      log.info(`Sanitized ${report.processed} files`, summary);
    }
    return report;
  }

  /**
   * A fixed pool of workers pulls tasks from a shared cursor. Results keep the
   * task order regardless of completion order.
   */
  private async runWorkers(tasks: FileTask[]): Promise<FileOutcome[]> {
    const outcomes = new Array<FileOutcome>(tasks.length);
    const workerCount = tasks.length === 0 ? 0 : Math.min(Math.max(1, this.config.concurrency), tasks.length);
    const options = {
      placeholder: this.config.placeholder,
      maintainLength: this.config.maintainLength,
      dryRun: this.config.dryRun,
    };
    let cursor = 0;

    const workers = Array.from({ length: workerCount }, async () => {
      while (cursor < tasks.length) {
        const index = cursor;
        cursor += 1;
        const task = tasks[index];
        log.info(`Processing ${task.sourcePath}`);
        outcomes[index] = await processFile(task, this.ruleSet, options);
      }
    });
    await Promise.all(workers);
    return outcomes;
  }

  /** When the output tree lives inside the source tree it must not be read back as input. */
  private outputPrefix(): string[] {
    const rel = relative(this.config.sourceDir, this.config.outputDir);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return [];
    }
    return [rel.split(sep).join('/')];
  }
}

async function assertDirectory(path: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (error) {
    throw new ConfigError(`Source directory not readable: ${path} (${describeError(error)})`, { cause: error });
  }
  if (!isDirectory) {
    throw new ConfigError(`Source path is not a directory: ${path}`);
  }
}

export async function sanitise(config: SanitizerConfig): Promise<SanitizeReport> {
  const sanitizer = await LogSanitizer.create(config);
  return sanitizer.sanitise();
}

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FileProcessingError } from '../common/errors';
import { getLogger } from '../common/logger';
import type { RuleSet } from '../rules/types';
import { scrubAll } from './scrubber';
import type { FileOutcome, FileTask, ScrubOptions } from './types';

const log = getLogger('pipeline');

export interface ProcessFileOptions extends ScrubOptions {
  dryRun?: boolean;
}

/**
 * Sanitize one file into its mirrored destination. Failures are returned as a
 * `failed` outcome and never thrown, so one bad file leaves its siblings alone.
 */
export async function processFile(task: FileTask, ruleSet: RuleSet, options: ProcessFileOptions): Promise<FileOutcome> {
  try {
    // Decoding as utf8 substitutes U+FFFD for malformed sequences instead of failing.
    const content = await readFile(task.sourcePath, 'utf8');
    const { output, appliedRules } = scrubAll(ruleSet, content, options);
    for (const description of appliedRules) {
      log.debug(`Applied rule: ${description}`, { path: task.relativePath });
    }

    if (!options.dryRun) {
      await mkdir(dirname(task.destinationPath), { recursive: true });
      await writeFile(task.destinationPath, output, 'utf8');
    }
    return { status: 'sanitized', task, appliedRules };
  } catch (cause) {
    const error = new FileProcessingError(task.sourcePath, cause);
    log.error(error.message, { path: task.sourcePath });
    return { status: 'failed', task, error };
  }
}

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { SanitizerError, describeError } from '../common/errors';
import { LogFormat, LogLevel, configureLogger, getLogger, isLogLevel, levelFromVerbosity } from '../common/logger';
import { SanitizerSettings, loadConfig, resolveSanitizerConfig } from '../config';
import { getMetricsSnapshot } from '../observability';
import { LogSanitizer, SanitizeReport } from '../sanitizer';

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_FILE_FAILURES = 2;

export type CliOptions = {
  source?: string;
  output?: string;
  rules?: string;
  ignore?: string;
  placeholder?: string;
  stripLength?: boolean;
  concurrency?: number;
  dryRun?: boolean;
  failOnError?: boolean;
  config?: string;
  profile?: string;
  report?: string;
  metricsJson?: string;
  metricsProm?: string;
  verbose: number;
  logLevel?: string;
  logFormat?: string;
};

class SanitizerCliError extends Error {}

async function ensureDir(filePath: string) {
  await mkdir(dirname(filePath), { recursive: true });
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new SanitizerCliError(`Unsupported log level "${value}". Use one of silent,error,warn,info,debug.`);
}

function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }
  throw new SanitizerCliError(`Unsupported log format "${value}". Use text or json.`);
}

/** CLI flags as a settings layer; flags that were not given stay undefined. */
export function settingsFromOptions(options: CliOptions): SanitizerSettings {
  return {
    source: options.source,
    output: options.output,
    rules: options.rules,
    ignore: options.ignore,
    placeholder: options.placeholder,
    maintainLength: options.stripLength ? false : undefined,
    concurrency: options.concurrency,
    dryRun: options.dryRun ? true : undefined,
  };
}

async function writeArtifacts(options: CliOptions, report: SanitizeReport): Promise<void> {
  const log = getLogger('cli');
  if (options.report) {
    const reportPath = resolve(options.report);
    await ensureDir(reportPath);
    await writeFile(reportPath, JSON.stringify(report, null, 2));
    log.info(`Run report written to ${reportPath}`);
  }
  if (options.metricsJson) {
    const metricsPath = resolve(options.metricsJson);
    const metricsEvent = {
      event: 'log-sanitizer.sanitise',
      metrics: {
        timestamp: new Date().toISOString(),
        processed: report.processed,
        failed: report.failed,
        ignored: report.ignored,
        rules: report.rules,
        durationMs: report.durationMs,
        dryRun: report.dryRun,
      },
    };
    await ensureDir(metricsPath);
    await writeFile(metricsPath, JSON.stringify(metricsEvent, null, 2));
    log.info(`Metrics written to ${metricsPath}`);
  }
  if (options.metricsProm) {
    const promPath = resolve(options.metricsProm);
    await ensureDir(promPath);
    await writeFile(promPath, await getMetricsSnapshot());
    log.info(`Prometheus metrics written to ${promPath}`);
  }
}

async function execute(options: CliOptions): Promise<number> {
  const log = getLogger('cli');
  try {
    configureLogger({
      level: parseLogLevel(options.logLevel) ?? levelFromVerbosity(options.verbose),
      format: parseLogFormat(options.logFormat),
    });
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n`);
    return EXIT_CONFIG_ERROR;
  }

  let sanitizer: LogSanitizer;
  try {
    const fileSettings = options.config ? await loadConfig(options.config, options.profile) : {};
    const config = resolveSanitizerConfig(fileSettings, settingsFromOptions(options));
    sanitizer = await LogSanitizer.create(config);
  } catch (error) {
    if (error instanceof SanitizerError) {
      log.error(error.message, { code: error.code });
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  const report = await sanitizer.sanitise();
  if (report.dryRun) {
    for (const file of report.files) {
      process.stdout.write(`${file}\n`);
    }
  }
  await writeArtifacts(options, report);

  if (report.failed > 0) {
    log.warn(`${report.failed} of ${report.processed + report.failed} files could not be sanitized`);
    return options.failOnError ? EXIT_FILE_FAILURES : EXIT_OK;
  }
  return EXIT_OK;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('log-sanitizer')
    .description('Write sanitized copies of a directory of text files, masking regex matches')
    .option('--source <dir>', 'Directory containing files to sanitise (default: "source")')
    .option('--output <dir>', 'Directory to write anonymised files to (default: "results")')
    .option('--rules <file>', 'Path to the rules file (default: "main.rule")')
    .option('--ignore <file>', 'File containing glob patterns for files to ignore (default: "ignore.list")')
    .option('--placeholder <text>', 'Replacement token for detected matches (default: "*")')
    .option('--strip-length', 'Do not maintain the original match length when replacing')
    .option('--concurrency <n>', 'Number of files processed in parallel (default: 8)', parseConcurrency)
    .option('--dry-run', 'List the files that would be sanitized without writing anything')
    .option('--fail-on-error', 'Exit with status 2 when any file could not be sanitized')
    .option('--config <path>', 'YAML, TOML or JSON config file')
    .option('--profile <name>', 'Config profile')
    .option('--report <path>', 'Write the run report to a JSON file')
    .option('--metrics-json <path>', 'Write the run metrics event to a JSON file')
    .option('--metrics-prom <path>', 'Write Prometheus metrics text to a file')
    .option('-v, --verbose', 'Increase logging verbosity (use -vv for debug)', increaseVerbosity, 0)
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.LOG_SANITIZER_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.LOG_SANITIZER_LOG_FORMAT)
    .exitOverride();
  return program;
}

/** Parse `argv` and run one sanitization; resolves with the process exit code. */
export async function runCli(argv = process.argv): Promise<number> {
  const program = buildProgram();
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return execute(program.opts<CliOptions>());
}

export interface SanitizerSettings {
  source?: string;
  output?: string;
  rules?: string;
  ignore?: string;
  placeholder?: string;
  maintainLength?: boolean;
  concurrency?: number;
  dryRun?: boolean;
}

export interface LogSanitizerConfig {
  sanitizer: SanitizerSettings;
  profiles?: Record<string, { sanitizer?: SanitizerSettings }>;
}

export const DEFAULT_SETTINGS: Readonly<Required<SanitizerSettings>> = Object.freeze({
  source: 'source',
  output: 'results',
  rules: 'main.rule',
  ignore: 'ignore.list',
  placeholder: '*',
  maintainLength: true,
  concurrency: 8,
  dryRun: false,
});

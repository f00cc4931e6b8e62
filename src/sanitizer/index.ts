export * from './types';
export * from './scrubber';
export * from './pipeline';
export * from './orchestrator';

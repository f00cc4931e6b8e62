export * from './types';
export * from './filesystem';

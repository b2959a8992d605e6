export * from './classify/types';
export * from './classify/parser';
export * from './runner/env';
export * from './runner/process';
export * from './sandbox/snapshot';
export * from './sandbox/runner';

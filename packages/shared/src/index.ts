export const name = '@testmend/shared';

export * from './errors';
export * from './types/checklist';
export * from './types/diagnosis';
export * from './types/patch';
export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './json-utils';
export * from './string-utils';
export * from './fs/io';
export * from './fs/path';
export * from './fs/artifacts';
export * from './config/schema';
export * from './summary/summary';

export const name = '@testmend/adapters';

export * from './types';
export * from './adapter';
export * from './errors';
export * from './base-adapter';
export * from './common';
export * from './openai';
export * from './fake/adapter';
export * from './factory';

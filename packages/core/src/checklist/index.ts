export * from './types';
export * from './schema';
export * from './document';
export * from './file_store';
export * from './memory_store';

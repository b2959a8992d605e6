export * from './types';
export * from './prompts';
export * from './llm_collaborator';

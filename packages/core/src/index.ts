export const name = '@testmend/core';

export * from './checklist';
export * from './collaborator';
export * from './config/loader';
export * from './diagnosis';
export * from './engine';
export * from './escalation';
export * from './run';

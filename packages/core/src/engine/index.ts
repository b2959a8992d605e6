export * from './state_machine';
export * from './scheduler';
export * from './events';
export * from './engine';

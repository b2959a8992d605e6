export * from './summary';
export * from './runtime';
export * from './report';

export * from './signature';
export * from './rules';
export * from './routing';
export * from './classifier';
export * from './knowledge';

export * from './types';
export * from './errors';
export * from './schemas';
export * from './utils/keys';
export * from './utils/clauses';

export * from './parsers';
export * from './censor';
export * from './resolver';
export * from './filter';
export * from './subquery';
export * from './plan';
export * from './joins';
export * from './annotations';
export * from './context';
export * from './commands';
export * from './params';
export * from './serializer';
export * from './engine';

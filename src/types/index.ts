export * from './ast';
export * from './bytecode';
export * from './object';
export * from './token';

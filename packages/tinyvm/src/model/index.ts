export * from './word.js';
export * from './bytecode.js';
export * from './ast.js';
export * from './types.js';

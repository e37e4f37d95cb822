export * from './confluence/index.js';
export * from './errors.js';

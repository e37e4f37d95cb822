export * from './confluence.js';
export * from './table.js';

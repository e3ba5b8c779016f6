export * from './app-error.js';
export * from './base.error.js';
export * from './pipeline-errors.js';

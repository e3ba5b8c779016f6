export * from './assemble-animation/index.js';
export * from './convert-rasters/index.js';
export * from './pipeline/index.js';

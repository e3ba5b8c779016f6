export * from './contracts/preview-repository.js';
export * from './contracts/raster-decoder.js';
export * from './contracts/source-locator.js';
export * from './services/raster-normalizer.js';
export * from './value-objects/preview-image.js';
export * from './value-objects/raster.js';
export * from './value-objects/stretch-policy.js';

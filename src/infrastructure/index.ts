export * from './animation/canvas-progress-overlay.js';
export * from './animation/gif-animation-encoder.js';
export * from './animation/gif-inspector.js';
export * from './filesystem/file-system-source-locator.js';
export * from './preview/png-preview-repository.js';
export * from './raster/geotiff-raster-decoder.js';
export * from './config/config-file.js';

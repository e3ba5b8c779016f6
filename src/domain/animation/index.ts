export * from './contracts/animation-encoder.js';
export * from './contracts/frame-overlay.js';
export * from './entities/frame-sequence.js';
export * from './value-objects/progress-bar.js';
export * from './value-objects/rgba-frame.js';

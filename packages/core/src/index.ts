// Re-export from submodules
export * from './config/index.js';
export * from './library/index.js';
export * from './playback/index.js';
export * from './utils/index.js';

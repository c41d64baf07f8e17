export * from './scheduler.js';
export * from './state.js';
export * from './stateHandlers.js';
export * from './videoSelector.js';
export * from './TitleOverlay.js';
export * from './controller.js';

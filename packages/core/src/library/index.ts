export * from './LibraryStore.js';
export * from './cache.js';
export * from './PlayHistory.js';

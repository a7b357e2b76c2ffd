export * from './items.js';
export * from './sink.js';
export * from './renderer.js';
export * from './formatter.js';

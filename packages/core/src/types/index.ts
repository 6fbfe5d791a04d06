export * from './document.js';
export * from './result.js';

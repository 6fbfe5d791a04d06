export * from './document-use-cases.js';

export * from './serializing-repository.js';

export * from './reactive-document-gateway.js';

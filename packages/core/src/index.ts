// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Per-key serialization
export * from './concurrency/index.js';

// Shared keyed channels
export * from './channels/index.js';

// Document gateway
export * from './gateway/index.js';

// Typed repository
export * from './repository/index.js';

// Use cases
export * from './usecases/index.js';

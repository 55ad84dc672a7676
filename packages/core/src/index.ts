// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Encoding
export * from './encoding/index.js';

// Change Tracking
export * from './change-tracking/index.js';

// Wire schemas
export * from './wire/index.js';

// Utilities
export * from './utils/index.js';

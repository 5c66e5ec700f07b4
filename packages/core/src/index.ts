/**
 * @relaykit/core — Shared types, validation schemas, and errors
 */

// Re-export all types
export * from './types.js';

// Re-export history storage interface
export * from './storage.js';

// Re-export schemas
export * from './schemas.js';

// Re-export constants
export * from './constants.js';

// Re-export errors
export * from './errors.js';

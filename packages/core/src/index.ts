/**
 * @tableparity/core
 *
 * Domain types, engine interfaces and shared utilities for table verification
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export * from './logging/index.js';

// Report types
export * from './types/index.js';

// Zod schemas (canonical records + provider payloads)
export * from './schemas/index.js';

// Store gateway interfaces
export * from './store/index.js';

// Error taxonomy
export * from './errors.js';

// Report JSON-schema validation (AJV)
export * from './validation/index.js';

// Pure utils (date, money, concurrency, logging, constants)
export * from './utils/index.js';

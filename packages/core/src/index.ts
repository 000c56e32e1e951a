// Shared
export * from './shared/index.js';

// Entity model
export * from './entities/index.js';

// Storage
export * from './storage/index.js';

// Revision Ledger
export * from './ledger/index.js';

// Graph invariants
export * from './graph/index.js';

// Soft-delete and cascade
export * from './cascade/index.js';

// Traversal and export
export * from './traversal/index.js';

// Observability
export * from './observability/index.js';

/**
 * @creditledger/core — Ledger types, plan catalog, billing windows and event decoding
 */

// Re-export all types
export * from './types.js';

// Re-export constants
export * from './constants.js';

// Re-export error taxonomy
export * from './errors.js';

// Re-export rolling window calculator
export * from './billing-window.js';

// Re-export entitlement math
export * from './entitlements.js';

// Re-export plan/price catalog
export * from './catalog.js';

// Re-export provider event decoding
export * from './provider-events.js';

// Re-export request schemas
export * from './schemas.js';

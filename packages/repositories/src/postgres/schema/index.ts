// Re-export all schema tables
// Both stores share one schema module; deployments point each store at its own database.
export * from './identity.js';
export * from './processing.js';

// Re-export all protocol types

export * from './common.js';
export * from './identity.js';
export * from './envelopes.js';
export * from './analyses.js';
export * from './escalations.js';
export * from './reports.js';

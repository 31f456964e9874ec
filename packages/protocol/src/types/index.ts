// Re-export all protocol types

export * from './common.js';
export * from './locations.js';
export * from './users.js';
export * from './conditions.js';
export * from './sessions.js';

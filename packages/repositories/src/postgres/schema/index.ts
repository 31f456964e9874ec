// Re-export all schema tables
export * from './locations.js';
export * from './users.js';
export * from './conditions.js';
export * from './sessions.js';

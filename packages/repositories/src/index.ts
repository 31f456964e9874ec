// @surflog/repositories
// Repository interfaces and implementations for session storage.
//
// This package defines the "contract" for data operations. The actual implementations
// (Postgres, in-memory) fulfill these contracts, allowing the runtime to work with
// either storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - TransactionalRepositoryContext adds all-or-nothing units of work

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export * as memory from './in-memory/index.js';

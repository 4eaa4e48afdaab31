// @hubspoke/repositories
// Store contracts and implementations for the hub and the spoke.
//
// This package defines the "contract" for reading Grants and writing RBAC
// objects. The in-memory and Kubernetes implementations fulfill it, so the
// runtime never holds a client of its own.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles the hub and spoke stores for dependency injection
// - Store errors share one taxonomy across implementations

export * from './interfaces/index.js';
export {
  StoreError,
  ObjectNotFoundError,
  ObjectAlreadyExistsError,
  ObjectConflictError,
  MalformedObjectError,
} from './errors.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryDataStore,
  type InMemoryRepositoryContext,
} from './in-memory/index.js';
export * as kubernetes from './kubernetes/index.js';

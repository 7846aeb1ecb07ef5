/**
 * Storage module - Pluggable persistence adapters
 *
 * This module defines the storage interface and provides a reference
 * implementation. Hosts bring their own persistence layer by
 * implementing AgreementStorage.
 */

// Types
export type {
	AgreementQuery,
	AgreementStorage,
	BalanceWrite,
	QueryResult,
} from "./types.js";

export { StorageError } from "./types.js";

// Reference implementations
export { MemoryStorageAdapter } from "./memory-adapter.js";

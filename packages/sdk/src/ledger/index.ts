/**
 * Ledger module - Value transfer gateway
 */

export type { LedgerGateway } from "./types.js";
export { InsufficientFundsError } from "./types.js";
export { MemoryLedger } from "./memory-ledger.js";

/**
 * Bridgarr SDK
 *
 * Two-party escrow agreements: a vendor and a buyer agree on a fixed
 * amount, the buyer deposits it into custody, and it is released to the
 * vendor on completion or returned to the buyer by the arbiter.
 *
 * @example
 * ```typescript
 * import {
 *   EscrowEngine,
 *   MemoryLedger,
 *   MemoryStorageAdapter,
 * } from "@bridgarr/sdk";
 *
 * const engine = new EscrowEngine({
 *   arbiter: "arbiter",
 *   custodian: "escrow-custody",
 *   storage: new MemoryStorageAdapter(),
 *   ledger: new MemoryLedger({ buyer: 1000 }),
 * });
 *
 * const id = await engine.createAgreement("vendor", {
 *   buyer: "buyer",
 *   amount: 1000,
 *   description: "Website copy",
 * });
 * await engine.fundAgreement("buyer", id);
 * ```
 */

// Contracts - State machines and lifecycle
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type ActionResult,
	ContractStateMachine,
	ContractError,
	createState,
	createTransition,
} from "./contracts/index.js";

// Agreements - Escrow engine
export {
	type Identity,
	type AgreementId,
	type AgreementRole,
	type AgreementStatus,
	type AgreementAction,
	type Agreement,
	type EscrowBalance,
	type CreateAgreementInput,
	type AgreementTransitionContext,
	type EscrowErrorCode,
	type EngineLogger,
	type EscrowEngineConfig,
	AGREEMENT_STATUSES,
	AGREEMENT_STATE_MACHINE,
	ACTION_ROLES,
	ESCROW_ERROR_NUMBERS,
	MAX_DESCRIPTION_LENGTH,
	EscrowEngine,
	EscrowError,
	isEscrowError,
	holdsCustody,
	isFinalStatus,
	getAllowedActions,
} from "./agreements/index.js";

// Storage - Pluggable persistence
export {
	type AgreementQuery,
	type AgreementStorage,
	type BalanceWrite,
	type QueryResult,
	StorageError,
	MemoryStorageAdapter,
} from "./storage/index.js";

// Ledger - Value transfer
export {
	type LedgerGateway,
	InsufficientFundsError,
	MemoryLedger,
} from "./ledger/index.js";

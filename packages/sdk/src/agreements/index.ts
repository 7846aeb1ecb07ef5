/**
 * Agreements module - Two-party escrow agreements
 */

export type {
	Identity,
	AgreementId,
	AgreementRole,
	AgreementStatus,
	AgreementAction,
	Agreement,
	EscrowBalance,
	CreateAgreementInput,
	AgreementTransitionContext,
} from "./types.js";

export { AGREEMENT_STATUSES } from "./types.js";

export {
	type EscrowErrorCode,
	ESCROW_ERROR_NUMBERS,
	EscrowError,
	isEscrowError,
} from "./errors.js";

export {
	AGREEMENT_STATE_MACHINE,
	ACTION_ROLES,
	holdsCustody,
	isFinalStatus,
	getAllowedActions,
} from "./agreement-state-machine.js";

export {
	type EngineLogger,
	type EscrowEngineConfig,
	EscrowEngine,
	MAX_DESCRIPTION_LENGTH,
} from "./escrow-engine.js";

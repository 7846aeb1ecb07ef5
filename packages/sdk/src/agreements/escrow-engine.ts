/**
 * Escrow Engine
 *
 * Owns the agreement lifecycle: id assignment, authorization and status
 * checks, and the custody bookkeeping tied to each transition.
 */

import { Mutex, MutexInterface } from "async-mutex";
import { ContractStateMachine } from "../contracts/index.js";
import { InsufficientFundsError, LedgerGateway } from "../ledger/index.js";
import {
	AgreementQuery,
	AgreementStorage,
	BalanceWrite,
	QueryResult,
	StorageError,
} from "../storage/index.js";
import {
	ACTION_ROLES,
	AGREEMENT_STATE_MACHINE,
	getAllowedActions,
	holdsCustody,
} from "./agreement-state-machine.js";
import { EscrowError } from "./errors.js";
import {
	Agreement,
	AgreementAction,
	AgreementId,
	AgreementRole,
	AgreementTransitionContext,
	CreateAgreementInput,
	EscrowBalance,
	Identity,
} from "./types.js";

export const MAX_DESCRIPTION_LENGTH = 256;

/**
 * Minimal logger shape; Nest's Logger satisfies it.
 */
export interface EngineLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export interface EscrowEngineConfig {
	/** Identity allowed to refund disputed agreements */
	arbiter: Identity;
	/** Ledger identity that holds custodied funds */
	custodian: Identity;
	storage: AgreementStorage;
	ledger: LedgerGateway;
	/** Timestamp source for `createdAt`, defaults to Date.now */
	clock?: () => number;
	logger?: EngineLogger;
	/**
	 * Lock held across each create and transition. Pass the one other
	 * writers to the same storage or ledger hold; defaults to a private one.
	 */
	lock?: MutexInterface;
}

interface Transfer {
	amount: number;
	from: Identity;
	to: Identity;
}

const silentLogger: EngineLogger = {
	log: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

function assertIdentity(value: unknown, field: string): asserts value is Identity {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new EscrowError("INVALID_ARGUMENT", `${field} is required`, {
			field,
		});
	}
}

function validateCreateInput(input: CreateAgreementInput): void {
	assertIdentity(input.buyer, "buyer");
	if (!Number.isSafeInteger(input.amount) || input.amount <= 0) {
		throw new EscrowError(
			"INVALID_ARGUMENT",
			"Amount must be a positive integer",
			{ field: "amount", amount: input.amount },
		);
	}
	if (typeof input.description !== "string") {
		throw new EscrowError("INVALID_ARGUMENT", "description is required", {
			field: "description",
		});
	}
	// Counted in Unicode scalar values, not UTF-16 code units
	const length = Array.from(input.description).length;
	if (length > MAX_DESCRIPTION_LENGTH) {
		throw new EscrowError(
			"INVALID_ARGUMENT",
			`Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`,
			{ field: "description", length },
		);
	}
}

function alreadyExists(id: AgreementId, cause?: unknown): EscrowError {
	return new EscrowError(
		"ALREADY_EXISTS",
		`Agreement ${id} already exists`,
		{ agreementId: id },
		{ cause },
	);
}

/**
 * Escrow Engine
 *
 * Every mutating operation checks, in this order and before any side
 * effect: the agreement exists, the caller holds the required role, the
 * agreement is in the required status. Fund-moving transitions commit
 * their status change only after the ledger transfer succeeded.
 *
 * Creates and transitions run one at a time under a single lock, from the
 * first read to the commit. Reads do not take it.
 *
 * @example
 * ```typescript
 * const engine = new EscrowEngine({
 *   arbiter: "arbiter",
 *   custodian: "escrow-custody",
 *   storage: new MemoryStorageAdapter(),
 *   ledger: new MemoryLedger({ buyer: 5000 }),
 * });
 *
 * const id = await engine.createAgreement("vendor", {
 *   buyer: "buyer",
 *   amount: 1000,
 *   description: "Logo design",
 * });
 * await engine.fundAgreement("buyer", id);
 * await engine.acceptAgreement("buyer", id);
 * await engine.completeAgreement("buyer", id);
 * ```
 */
export class EscrowEngine {
	readonly arbiter: Identity;
	readonly custodian: Identity;
	private readonly storage: AgreementStorage;
	private readonly ledger: LedgerGateway;
	private readonly clock: () => number;
	private readonly logger: EngineLogger;
	private readonly lock: MutexInterface;

	constructor(config: EscrowEngineConfig) {
		assertIdentity(config.arbiter, "arbiter");
		assertIdentity(config.custodian, "custodian");
		this.arbiter = config.arbiter;
		this.custodian = config.custodian;
		this.storage = config.storage;
		this.ledger = config.ledger;
		this.clock = config.clock ?? Date.now;
		this.logger = config.logger ?? silentLogger;
		this.lock = config.lock ?? new Mutex();
	}

	// ==================== Lifecycle ====================

	/**
	 * Create an agreement; the caller becomes its vendor.
	 */
	async createAgreement(
		caller: Identity,
		input: CreateAgreementInput,
	): Promise<AgreementId> {
		assertIdentity(caller, "caller");
		validateCreateInput(input);

		return this.lock.runExclusive(async () => {
			const id = (await this.storage.currentId()) + 1;
			if (await this.storage.hasAgreement(id)) {
				throw alreadyExists(id);
			}

			try {
				await this.storage.insertAgreement({
					id,
					vendor: caller,
					buyer: input.buyer,
					amount: input.amount,
					description: input.description,
					status: AGREEMENT_STATE_MACHINE.initialState,
					createdAt: this.clock(),
				});
			} catch (err) {
				if (err instanceof StorageError && err.code === "DUPLICATE_KEY") {
					throw alreadyExists(id, err);
				}
				throw err;
			}
			this.logger.log(
				`Agreement ${id} created by ${caller} for buyer ${input.buyer} (${input.amount})`,
			);
			return id;
		});
	}

	/**
	 * Buyer deposits the amount into custody.
	 */
	fundAgreement(caller: Identity, id: AgreementId): Promise<true> {
		return this.transition(caller, id, "fund");
	}

	/**
	 * Buyer acknowledges a funded agreement.
	 */
	acceptAgreement(caller: Identity, id: AgreementId): Promise<true> {
		return this.transition(caller, id, "accept");
	}

	/**
	 * Buyer releases custody to the vendor.
	 */
	completeAgreement(caller: Identity, id: AgreementId): Promise<true> {
		return this.transition(caller, id, "complete");
	}

	/**
	 * Buyer disputes an accepted agreement.
	 */
	disputeAgreement(caller: Identity, id: AgreementId): Promise<true> {
		return this.transition(caller, id, "dispute");
	}

	/**
	 * Arbiter returns custody of a disputed agreement to the buyer.
	 */
	refundAgreement(caller: Identity, id: AgreementId): Promise<true> {
		return this.transition(caller, id, "refund");
	}

	// ==================== Reads ====================

	getAgreement(id: AgreementId): Promise<Agreement | null> {
		return this.storage.loadAgreement(id);
	}

	getEscrowBalance(id: AgreementId): Promise<EscrowBalance | null> {
		return this.storage.loadBalance(id);
	}

	listAgreements(query?: AgreementQuery): Promise<QueryResult<Agreement>> {
		return this.storage.query(query);
	}

	/**
	 * Roles an identity holds on an agreement.
	 */
	roleOf(agreement: Agreement, identity: Identity): AgreementRole[] {
		const roles: AgreementRole[] = [];
		if (identity === agreement.vendor) roles.push("vendor");
		if (identity === agreement.buyer) roles.push("buyer");
		if (identity === this.arbiter) roles.push("arbiter");
		return roles;
	}

	/**
	 * Actions the identity may perform on the agreement right now.
	 */
	allowedActionsFor(
		agreement: Agreement,
		identity: Identity,
	): AgreementAction[] {
		const roles = this.roleOf(agreement, identity);
		return getAllowedActions(agreement.status).filter((action) =>
			roles.includes(ACTION_ROLES[action]),
		);
	}

	// ==================== Internals ====================

	private transition(
		caller: Identity,
		id: AgreementId,
		action: AgreementAction,
	): Promise<true> {
		return this.lock.runExclusive(() => this.applyTransition(caller, id, action));
	}

	private async applyTransition(
		caller: Identity,
		id: AgreementId,
		action: AgreementAction,
	): Promise<true> {
		const agreement = await this.storage.loadAgreement(id);
		if (!agreement) {
			throw new EscrowError("NOT_FOUND", `Agreement ${id} not found`, {
				agreementId: id,
				action,
			});
		}

		const requiredRole = ACTION_ROLES[action];
		if (!this.roleOf(agreement, caller).includes(requiredRole)) {
			throw new EscrowError(
				"NOT_AUTHORIZED",
				`Only the ${requiredRole} can ${action} agreement ${id}`,
				{ agreementId: id, action, requiredRole },
			);
		}

		const machine = new ContractStateMachine(
			AGREEMENT_STATE_MACHINE,
			agreement.status,
		);
		if (!machine.canPerform(action)) {
			throw new EscrowError(
				"INVALID_STATUS",
				`Cannot ${action} agreement ${id} in status ${agreement.status}`,
				{
					agreementId: id,
					action,
					status: agreement.status,
					allowedActions: machine.getAllowedActions(),
				},
			);
		}

		const transfers: Transfer[] = [];
		const context: AgreementTransitionContext = {
			agreement,
			balance: await this.storage.loadBalance(id),
			custodian: this.custodian,
			moveFunds: async (amount, from, to) => {
				await this.moveFunds(agreement, action, { amount, from, to });
				transfers.push({ amount, from, to });
			},
		};

		const { newState } = await machine.perform(action, context);
		const next: Agreement = { ...agreement, status: newState };

		try {
			await this.storage.commitTransition(
				next,
				agreement.status,
				this.balanceWrite(agreement, next),
			);
		} catch (err) {
			await this.compensate(next, transfers);
			throw err;
		}

		this.logger.log(
			`Agreement ${id} ${agreement.status} -> ${newState} (${action} by ${caller})`,
		);
		return true;
	}

	private balanceWrite(previous: Agreement, next: Agreement): BalanceWrite {
		const held = holdsCustody(previous.status);
		const holds = holdsCustody(next.status);
		if (held === holds) {
			return { kind: "none" };
		}
		if (holds) {
			return {
				kind: "create",
				balance: { agreementId: next.id, balance: next.amount },
			};
		}
		return { kind: "delete" };
	}

	private async moveFunds(
		agreement: Agreement,
		action: AgreementAction,
		transfer: Transfer,
	): Promise<void> {
		try {
			await this.ledger.transfer(transfer.amount, transfer.from, transfer.to);
		} catch (err) {
			if (err instanceof InsufficientFundsError) {
				this.logger.warn(
					`Agreement ${agreement.id}: ${action} rejected, ${err.message}`,
				);
				throw new EscrowError(
					"INSUFFICIENT_FUNDS",
					`Insufficient funds to ${action} agreement ${agreement.id}`,
					{
						agreementId: agreement.id,
						action,
						account: err.account,
						requested: err.requested,
						available: err.available,
					},
					{ cause: err },
				);
			}
			throw err;
		}
	}

	/**
	 * Reverse the transfers of a transition whose commit failed.
	 */
	private async compensate(
		agreement: Agreement,
		transfers: Transfer[],
	): Promise<void> {
		for (const transfer of [...transfers].reverse()) {
			try {
				await this.ledger.transfer(transfer.amount, transfer.to, transfer.from);
				this.logger.warn(
					`Agreement ${agreement.id}: reversed transfer of ${transfer.amount} from ${transfer.from} to ${transfer.to}`,
				);
			} catch (err) {
				this.logger.error(
					`Agreement ${agreement.id}: failed to reverse transfer of ${transfer.amount} from ${transfer.from} to ${transfer.to}: ${
						err instanceof Error ? err.message : String(err)
					}`,
				);
			}
		}
	}
}

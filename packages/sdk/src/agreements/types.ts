/**
 * Agreement Module Types
 *
 * Types specific to two-party escrow agreements.
 */

/**
 * Opaque identity of a party, as reported by the host's authentication.
 */
export type Identity = string;

/**
 * Sequential agreement identifier, starting at 1.
 */
export type AgreementId = number;

/**
 * Agreement roles.
 */
export type AgreementRole = "vendor" | "buyer" | "arbiter";

/**
 * Agreement statuses.
 *
 * Lifecycle:
 * - pending: Created by the vendor, waiting for the buyer's deposit
 * - funded: Buyer deposited the amount into custody
 * - accepted: Buyer acknowledged the delivery terms
 * - completed: Custody released to the vendor (terminal)
 * - disputed: Buyer opened a dispute, waiting for the arbiter
 * - refunded: Arbiter returned custody to the buyer (terminal)
 */
export type AgreementStatus =
	| "pending"
	| "funded"
	| "accepted"
	| "completed"
	| "disputed"
	| "refunded";

export const AGREEMENT_STATUSES: readonly AgreementStatus[] = [
	"pending",
	"funded",
	"accepted",
	"completed",
	"disputed",
	"refunded",
];

/**
 * Agreement actions (transitions after creation).
 */
export type AgreementAction =
	| "fund" // Buyer deposits the amount
	| "accept" // Buyer acknowledges
	| "complete" // Buyer releases custody to the vendor
	| "dispute" // Buyer opens a dispute
	| "refund"; // Arbiter returns custody to the buyer

export interface Agreement {
	readonly id: AgreementId;
	readonly vendor: Identity;
	readonly buyer: Identity;
	readonly amount: number;
	readonly description: string;
	readonly status: AgreementStatus;
	/** Clock value at creation */
	readonly createdAt: number;
}

/**
 * Funds held in custody for an agreement.
 */
export interface EscrowBalance {
	readonly agreementId: AgreementId;
	readonly balance: number;
}

export interface CreateAgreementInput {
	buyer: Identity;
	amount: number;
	description: string;
}

/**
 * Context handed to the agreement state machine on every transition.
 */
export interface AgreementTransitionContext {
	agreement: Agreement;
	/** Custody record, present from funding until completion or refund */
	balance: EscrowBalance | null;
	custodian: Identity;
	moveFunds(amount: number, from: Identity, to: Identity): Promise<void>;
}

/**
 * Storage Adapter Types
 *
 * Defines the interface for pluggable storage backends. Hosts bring
 * their own persistence layer (SQLite, Postgres, in-memory, etc.)
 * by implementing it.
 */

import {
	Agreement,
	AgreementId,
	AgreementStatus,
	EscrowBalance,
	Identity,
} from "../agreements/types.js";

/**
 * What a transition does to the custody record.
 */
export type BalanceWrite =
	| { kind: "create"; balance: EscrowBalance }
	| { kind: "delete" }
	| { kind: "none" };

/**
 * Query options for listing agreements.
 */
export interface AgreementQuery {
	/** Only agreements where this identity is vendor or buyer */
	party?: Identity;
	/** Filter by status(es) */
	status?: AgreementStatus | AgreementStatus[];
	/** Only agreements with a lower id (keyset pagination) */
	beforeId?: AgreementId;
	/** Maximum number of results */
	limit?: number;
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query, newest first */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * Storage adapter interface.
 *
 * Holds the two registries (agreements and escrow balances) and the
 * scalar id counter. Each write method must be atomic: either every
 * record it names is written, or none is.
 *
 * @example
 * ```typescript
 * class PostgresStorageAdapter implements AgreementStorage {
 *   constructor(private pool: Pool) {}
 *
 *   async loadAgreement(id: AgreementId): Promise<Agreement | null> {
 *     const { rows } = await this.pool.query(
 *       "SELECT * FROM agreements WHERE id = $1",
 *       [id],
 *     );
 *     return rows[0] ?? null;
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface AgreementStorage {
	/**
	 * Load an agreement.
	 *
	 * @returns The agreement if found, null otherwise
	 */
	loadAgreement(id: AgreementId): Promise<Agreement | null>;

	/**
	 * Check if an agreement id is occupied.
	 */
	hasAgreement(id: AgreementId): Promise<boolean>;

	/**
	 * Load the custody record of an agreement.
	 */
	loadBalance(id: AgreementId): Promise<EscrowBalance | null>;

	/**
	 * Last id handed out, 0 before the first agreement.
	 */
	currentId(): Promise<number>;

	/**
	 * Store a new agreement and advance the counter to its id.
	 */
	insertAgreement(agreement: Agreement): Promise<void>;

	/**
	 * Store the new status of an agreement together with its custody change.
	 *
	 * Only applies while the stored status still equals `previousStatus`;
	 * otherwise nothing is written and a `STALE_STATUS` StorageError is
	 * thrown.
	 */
	commitTransition(
		agreement: Agreement,
		previousStatus: AgreementStatus,
		balance: BalanceWrite,
	): Promise<void>;

	/**
	 * List agreements with pagination info.
	 */
	query(options?: AgreementQuery): Promise<QueryResult<Agreement>>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "StorageError";
	}
}

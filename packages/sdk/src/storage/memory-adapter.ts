/**
 * In-Memory Storage Adapter
 *
 * A simple in-memory storage adapter for testing and development.
 * Data is lost when the process exits.
 */

import {
	Agreement,
	AgreementId,
	AgreementStatus,
	EscrowBalance,
} from "../agreements/types.js";
import {
	AgreementQuery,
	AgreementStorage,
	BalanceWrite,
	QueryResult,
	StorageError,
} from "./types.js";

/**
 * In-memory storage adapter.
 *
 * Useful for:
 * - Unit testing
 * - Development and prototyping
 * - Short-lived applications
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorageAdapter();
 * const engine = new EscrowEngine({ storage, ledger, arbiter, custodian });
 * ```
 */
export class MemoryStorageAdapter implements AgreementStorage {
	private readonly agreements: Map<AgreementId, Agreement> = new Map();
	private readonly balances: Map<AgreementId, EscrowBalance> = new Map();
	private lastId = 0;

	async loadAgreement(id: AgreementId): Promise<Agreement | null> {
		const agreement = this.agreements.get(id);
		// Return a copy to prevent external mutations
		return agreement ? { ...agreement } : null;
	}

	async hasAgreement(id: AgreementId): Promise<boolean> {
		return this.agreements.has(id);
	}

	async loadBalance(id: AgreementId): Promise<EscrowBalance | null> {
		const balance = this.balances.get(id);
		return balance ? { ...balance } : null;
	}

	async currentId(): Promise<number> {
		return this.lastId;
	}

	async insertAgreement(agreement: Agreement): Promise<void> {
		if (this.agreements.has(agreement.id)) {
			throw new StorageError(
				`Agreement ${agreement.id} already stored`,
				"DUPLICATE_KEY",
				{ id: agreement.id },
			);
		}
		this.agreements.set(agreement.id, { ...agreement });
		this.lastId = Math.max(this.lastId, agreement.id);
	}

	async commitTransition(
		agreement: Agreement,
		previousStatus: AgreementStatus,
		balance: BalanceWrite,
	): Promise<void> {
		const stored = this.agreements.get(agreement.id);
		if (!stored) {
			throw new StorageError(
				`Agreement ${agreement.id} not stored`,
				"MISSING_KEY",
				{ id: agreement.id },
			);
		}
		if (stored.status !== previousStatus) {
			throw new StorageError(
				`Agreement ${agreement.id} is ${stored.status}, expected ${previousStatus}`,
				"STALE_STATUS",
				{ id: agreement.id, status: stored.status, expected: previousStatus },
			);
		}
		this.agreements.set(agreement.id, { ...agreement });
		switch (balance.kind) {
			case "create":
				this.balances.set(agreement.id, { ...balance.balance });
				break;
			case "delete":
				this.balances.delete(agreement.id);
				break;
			case "none":
				break;
		}
	}

	async query(options?: AgreementQuery): Promise<QueryResult<Agreement>> {
		let agreements = Array.from(this.agreements.values());

		if (options?.party) {
			const party = options.party;
			agreements = agreements.filter(
				(a) => a.vendor === party || a.buyer === party,
			);
		}

		if (options?.status) {
			const statuses = Array.isArray(options.status)
				? options.status
				: [options.status];
			agreements = agreements.filter((a) => statuses.includes(a.status));
		}

		if (options?.beforeId !== undefined) {
			const beforeId = options.beforeId;
			agreements = agreements.filter((a) => a.id < beforeId);
		}

		const total = agreements.length;

		agreements.sort((a, b) => b.id - a.id);
		const limit = options?.limit ?? agreements.length;
		const items = agreements.slice(0, limit).map((a) => ({ ...a }));

		return {
			items,
			total,
			hasMore: items.length < total,
		};
	}

	/**
	 * Clear all records and reset the counter.
	 */
	clear(): void {
		this.agreements.clear();
		this.balances.clear();
		this.lastId = 0;
	}

	/**
	 * Get the number of custody records held.
	 */
	balanceCount(): number {
		return this.balances.size;
	}
}

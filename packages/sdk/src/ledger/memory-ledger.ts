/**
 * In-Memory Ledger
 *
 * A reference LedgerGateway for testing and development.
 */

import { Identity } from "../agreements/types.js";
import { InsufficientFundsError, LedgerGateway } from "./types.js";

export class MemoryLedger implements LedgerGateway {
	private readonly accounts: Map<Identity, number> = new Map();

	constructor(initialBalances: Record<Identity, number> = {}) {
		for (const [identity, amount] of Object.entries(initialBalances)) {
			this.credit(identity, amount);
		}
	}

	async transfer(amount: number, from: Identity, to: Identity): Promise<void> {
		if (!Number.isSafeInteger(amount) || amount <= 0) {
			throw new RangeError(`Invalid transfer amount: ${amount}`);
		}
		const available = this.balanceOf(from);
		if (available < amount) {
			throw new InsufficientFundsError(from, amount, available);
		}
		this.accounts.set(from, available - amount);
		this.accounts.set(to, this.balanceOf(to) + amount);
	}

	/**
	 * Add funds to an account.
	 */
	credit(identity: Identity, amount: number): void {
		if (!Number.isSafeInteger(amount) || amount < 0) {
			throw new RangeError(`Invalid credit amount: ${amount}`);
		}
		this.accounts.set(identity, this.balanceOf(identity) + amount);
	}

	balanceOf(identity: Identity): number {
		return this.accounts.get(identity) ?? 0;
	}
}

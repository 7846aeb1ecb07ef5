/**
 * Ledger Gateway Types
 *
 * The value-transfer primitive the escrow engine relies on but does not
 * implement.
 */

import { Identity } from "../agreements/types.js";

/**
 * Moves value between two identities.
 *
 * Implementations must be atomic: a transfer either moves the full
 * amount or fails with no effect.
 */
export interface LedgerGateway {
	/**
	 * @throws InsufficientFundsError if `from` cannot cover the amount
	 */
	transfer(amount: number, from: Identity, to: Identity): Promise<void>;
}

/**
 * Error thrown when a ledger account cannot cover a transfer.
 */
export class InsufficientFundsError extends Error {
	constructor(
		public readonly account: Identity,
		public readonly requested: number,
		public readonly available: number,
	) {
		super(
			`Account ${account} holds ${available}, cannot transfer ${requested}`,
		);
		this.name = "InsufficientFundsError";
	}
}

import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import type { Repository } from "typeorm";
import { MutexInterface } from "async-mutex";
import { InsufficientFundsError, LedgerGateway } from "@bridgarr/sdk";
import { DATABASE_WRITE_LOCK } from "../common/database-write-lock";
import { LedgerAccount } from "./ledger-account.entity";

function assertAmount(amount: number): void {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw new RangeError(`Invalid amount ${amount}`);
	}
}

/**
 * Account balances kept in the `ledger_accounts` table. Identities without
 * a row hold 0.
 *
 * `transfer` is only called by the escrow engine, which already holds the
 * database write lock; `deposit` takes the lock itself.
 */
@Injectable()
export class AccountsLedgerService implements LedgerGateway {
	private readonly logger = new Logger(AccountsLedgerService.name);

	constructor(
		@InjectRepository(LedgerAccount)
		private readonly accounts: Repository<LedgerAccount>,
		@Inject(DATABASE_WRITE_LOCK)
		private readonly writeLock: MutexInterface,
	) {}

	async balanceOf(identity: string): Promise<number> {
		const account = await this.accounts.findOneBy({ identity });
		return account?.balance ?? 0;
	}

	async transfer(amount: number, from: string, to: string): Promise<void> {
		assertAmount(amount);
		await this.accounts.manager.transaction(async (manager) => {
			const source = await manager.findOneBy(LedgerAccount, { identity: from });
			const available = source?.balance ?? 0;
			if (available < amount) {
				throw new InsufficientFundsError(from, amount, available);
			}
			await manager.save(LedgerAccount, {
				identity: from,
				balance: available - amount,
			});
			const target = await manager.findOneBy(LedgerAccount, { identity: to });
			await manager.save(LedgerAccount, {
				identity: to,
				balance: (target?.balance ?? 0) + amount,
			});
		});
		this.logger.debug(`Transferred ${amount} from ${from} to ${to}`);
	}

	/**
	 * Credit an account from outside the ledger.
	 *
	 * @returns the new balance
	 */
	async deposit(identity: string, amount: number): Promise<number> {
		assertAmount(amount);
		const balance = await this.writeLock.runExclusive(() =>
			this.accounts.manager.transaction(async (manager) => {
				const account = await manager.findOneBy(LedgerAccount, { identity });
				const next = (account?.balance ?? 0) + amount;
				await manager.save(LedgerAccount, { identity, balance: next });
				return next;
			}),
		);
		this.logger.log(`Deposited ${amount} to ${identity}, balance ${balance}`);
		return balance;
	}
}

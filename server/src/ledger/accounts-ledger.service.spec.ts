import { DataSource } from "typeorm";
import { Mutex } from "async-mutex";
import { InsufficientFundsError } from "@bridgarr/sdk";
import { AccountsLedgerService } from "./accounts-ledger.service";
import { LedgerAccount } from "./ledger-account.entity";

describe("AccountsLedgerService", () => {
	let dataSource: DataSource;
	let ledger: AccountsLedgerService;
	let writeLock: Mutex;

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [LedgerAccount],
			synchronize: true,
		});
		await dataSource.initialize();
		writeLock = new Mutex();
		ledger = new AccountsLedgerService(
			dataSource.getRepository(LedgerAccount),
			writeLock,
		);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("should report 0 for an identity without an account", async () => {
		await expect(ledger.balanceOf("nobody")).resolves.toBe(0);
	});

	it("should credit deposits and return the new balance", async () => {
		await expect(ledger.deposit("bob", 3000)).resolves.toBe(3000);
		await expect(ledger.deposit("bob", 2000)).resolves.toBe(5000);
		await expect(ledger.balanceOf("bob")).resolves.toBe(5000);
	});

	it("should wait for the write lock before depositing", async () => {
		const release = await writeLock.acquire();

		const pending = ledger.deposit("bob", 100);
		await new Promise((resolve) => setImmediate(resolve));
		await expect(ledger.balanceOf("bob")).resolves.toBe(0);

		release();
		await expect(pending).resolves.toBe(100);
		expect(writeLock.isLocked()).toBe(false);
	});

	it("should move the full amount between accounts", async () => {
		await ledger.deposit("bob", 5000);

		await ledger.transfer(1000, "bob", "escrow-custody");

		await expect(ledger.balanceOf("bob")).resolves.toBe(4000);
		await expect(ledger.balanceOf("escrow-custody")).resolves.toBe(1000);
	});

	it("should leave both accounts untouched when the source cannot cover the amount", async () => {
		await ledger.deposit("bob", 500);

		const error = await ledger
			.transfer(1000, "bob", "escrow-custody")
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(InsufficientFundsError);
		if (!(error instanceof InsufficientFundsError)) throw error;
		expect(error.available).toBe(500);
		await expect(ledger.balanceOf("bob")).resolves.toBe(500);
		await expect(ledger.balanceOf("escrow-custody")).resolves.toBe(0);
	});

	it("should reject amounts that are not positive integers", async () => {
		await expect(ledger.transfer(0, "bob", "alice")).rejects.toBeInstanceOf(
			RangeError,
		);
		await expect(ledger.deposit("bob", 1.5)).rejects.toBeInstanceOf(RangeError);
	});
});

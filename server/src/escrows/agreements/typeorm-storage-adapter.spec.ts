import { DataSource, QueryFailedError } from "typeorm";
import { Agreement, StorageError } from "@bridgarr/sdk";
import { TypeOrmStorageAdapter } from "./typeorm-storage-adapter";
import { EscrowAgreement } from "./escrow-agreement.entity";
import { CustodyBalance } from "./custody-balance.entity";
import { EngineCounter } from "./engine-counter.entity";

const agreement = (id: number, overrides: Partial<Agreement> = {}): Agreement => ({
	id,
	vendor: "alice",
	buyer: "bob",
	amount: 1000,
	description: `Agreement ${id}`,
	status: "pending",
	createdAt: 1_735_689_600_000 + id,
	...overrides,
});

describe("TypeOrmStorageAdapter", () => {
	let dataSource: DataSource;
	let adapter: TypeOrmStorageAdapter;

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [EscrowAgreement, CustodyBalance, EngineCounter],
			synchronize: true,
		});
		await dataSource.initialize();
		adapter = new TypeOrmStorageAdapter(dataSource);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("should report 0 as the current id of an empty store", async () => {
		await expect(adapter.currentId()).resolves.toBe(0);
	});

	it("should insert an agreement and advance the counter", async () => {
		await adapter.insertAgreement(agreement(1));

		await expect(adapter.loadAgreement(1)).resolves.toEqual(agreement(1));
		await expect(adapter.hasAgreement(1)).resolves.toBe(true);
		await expect(adapter.hasAgreement(2)).resolves.toBe(false);
		await expect(adapter.currentId()).resolves.toBe(1);
	});

	it("should refuse a duplicate id without touching the stored agreement", async () => {
		await adapter.insertAgreement(agreement(1));

		await expect(
			adapter.insertAgreement(agreement(1, { vendor: "mallory" })),
		).rejects.toMatchObject({ name: "StorageError", code: "DUPLICATE_KEY" });
		await expect(adapter.loadAgreement(1)).resolves.toEqual(agreement(1));
	});

	it("should pass through query failures that are not key conflicts", async () => {
		await dataSource.query("DROP TABLE engine_counters");

		const error = await adapter
			.insertAgreement(agreement(1))
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(QueryFailedError);
		expect(error).not.toBeInstanceOf(StorageError);
		await expect(adapter.hasAgreement(1)).resolves.toBe(false);
	});

	it("should return null for unknown agreements and balances", async () => {
		await expect(adapter.loadAgreement(7)).resolves.toBeNull();
		await expect(adapter.loadBalance(7)).resolves.toBeNull();
	});

	it("should commit a status change with its custody record", async () => {
		await adapter.insertAgreement(agreement(1));

		await adapter.commitTransition(agreement(1, { status: "funded" }), "pending", {
			kind: "create",
			balance: { agreementId: 1, balance: 1000 },
		});

		await expect(adapter.loadAgreement(1)).resolves.toEqual(
			agreement(1, { status: "funded" }),
		);
		await expect(adapter.loadBalance(1)).resolves.toEqual({
			agreementId: 1,
			balance: 1000,
		});

		await adapter.commitTransition(agreement(1, { status: "completed" }), "funded", {
			kind: "delete",
		});

		await expect(adapter.loadBalance(1)).resolves.toBeNull();
		const stored = await adapter.loadAgreement(1);
		expect(stored?.status).toBe("completed");
	});

	it("should roll back the status when the custody write fails", async () => {
		await adapter.insertAgreement(agreement(1));
		await adapter.commitTransition(agreement(1, { status: "funded" }), "pending", {
			kind: "create",
			balance: { agreementId: 1, balance: 1000 },
		});

		// a second custody record for the same agreement violates the primary key
		await expect(
			adapter.commitTransition(agreement(1, { status: "accepted" }), "funded", {
				kind: "create",
				balance: { agreementId: 1, balance: 1000 },
			}),
		).rejects.toThrow();

		const stored = await adapter.loadAgreement(1);
		expect(stored?.status).toBe("funded");
	});

	it("should refuse to commit a transition for an unknown agreement", async () => {
		const error = await adapter
			.commitTransition(agreement(3, { status: "funded" }), "pending", {
				kind: "none",
			})
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(StorageError);
		if (!(error instanceof StorageError)) throw error;
		expect(error.code).toBe("MISSING_KEY");
	});

	it("should refuse a commit whose previous status is stale", async () => {
		await adapter.insertAgreement(agreement(1));
		await adapter.commitTransition(agreement(1, { status: "funded" }), "pending", {
			kind: "create",
			balance: { agreementId: 1, balance: 1000 },
		});

		const error = await adapter
			.commitTransition(agreement(1, { status: "completed" }), "accepted", {
				kind: "delete",
			})
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(StorageError);
		if (!(error instanceof StorageError)) throw error;
		expect(error.code).toBe("STALE_STATUS");
		const stored = await adapter.loadAgreement(1);
		expect(stored?.status).toBe("funded");
		await expect(adapter.loadBalance(1)).resolves.toEqual({
			agreementId: 1,
			balance: 1000,
		});
	});

	describe("query", () => {
		beforeEach(async () => {
			await adapter.insertAgreement(agreement(1));
			await adapter.insertAgreement(agreement(2, { buyer: "carol" }));
			await adapter.insertAgreement(agreement(3, { vendor: "carol", buyer: "bob" }));
			await adapter.commitTransition(agreement(3, { vendor: "carol", status: "funded" }), "pending", {
				kind: "create",
				balance: { agreementId: 3, balance: 1000 },
			});
		});

		it("should list every agreement newest first", async () => {
			const result = await adapter.query();

			expect(result.items.map((a) => a.id)).toEqual([3, 2, 1]);
			expect(result.total).toBe(3);
			expect(result.hasMore).toBe(false);
		});

		it("should filter by party on either side", async () => {
			const result = await adapter.query({ party: "carol" });

			expect(result.items.map((a) => a.id)).toEqual([3, 2]);
		});

		it("should filter by status", async () => {
			const result = await adapter.query({ status: ["funded"] });

			expect(result.items.map((a) => a.id)).toEqual([3]);
		});

		it("should page with beforeId and limit", async () => {
			const result = await adapter.query({ beforeId: 3, limit: 1 });

			expect(result.items.map((a) => a.id)).toEqual([2]);
			expect(result.total).toBe(2);
			expect(result.hasMore).toBe(true);
		});
	});
});

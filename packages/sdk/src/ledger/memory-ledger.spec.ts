import { MemoryLedger } from "./memory-ledger";
import { InsufficientFundsError } from "./types";

describe("MemoryLedger", () => {
	it("should move value between accounts", async () => {
		const ledger = new MemoryLedger({ alice: 300 });

		await ledger.transfer(120, "alice", "bob");

		expect(ledger.balanceOf("alice")).toBe(180);
		expect(ledger.balanceOf("bob")).toBe(120);
	});

	it("should fail without effect when the sender cannot cover the amount", async () => {
		const ledger = new MemoryLedger({ alice: 50 });

		const err = await ledger.transfer(51, "alice", "bob").catch((e: unknown) => e);

		expect(err).toBeInstanceOf(InsufficientFundsError);
		expect(err).toMatchObject({ account: "alice", requested: 51, available: 50 });
		expect(ledger.balanceOf("alice")).toBe(50);
		expect(ledger.balanceOf("bob")).toBe(0);
	});

	it("should reject non-positive amounts", async () => {
		const ledger = new MemoryLedger({ alice: 50 });
		await expect(ledger.transfer(0, "alice", "bob")).rejects.toThrow(RangeError);
		expect(() => ledger.credit("alice", -1)).toThrow(RangeError);
	});
});

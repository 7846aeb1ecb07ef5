import {
	ContractStateMachine,
	createState,
	createTransition,
} from "./state-machine";
import { ContractError, StateMachineConfig } from "./types";

type DoorState = "open" | "closed" | "locked" | "removed";
type DoorAction = "close" | "open" | "lock" | "remove";
type DoorContext = { hasKey: boolean; log: string[] };

const DOOR: StateMachineConfig<DoorState, DoorAction, DoorContext> = {
	initialState: "open",
	states: [
		createState<DoorState, DoorAction>("open", ["close", "remove"]),
		createState<DoorState, DoorAction>("closed", ["open", "lock"]),
		createState<DoorState, DoorAction>("locked", []),
		createState<DoorState, DoorAction>("removed", [], { isFinal: true }),
	],
	transitions: [
		createTransition<DoorState, DoorAction, DoorContext>("open", "close", "closed", {
			onTransition: (ctx) => {
				ctx.log.push("closing");
			},
		}),
		createTransition<DoorState, DoorAction, DoorContext>("closed", "open", "open"),
		createTransition<DoorState, DoorAction, DoorContext>("closed", "lock", "locked", {
			guard: (ctx) => ctx.hasKey,
		}),
		createTransition<DoorState, DoorAction, DoorContext>("open", "remove", "removed", {
			onTransition: async () => {
				throw new Error("hinges stuck");
			},
		}),
	],
};

describe("ContractStateMachine", () => {
	const context = (hasKey = false): DoorContext => ({ hasKey, log: [] });

	it("should start in the initial state", () => {
		const machine = new ContractStateMachine(DOOR);
		expect(machine.getState()).toBe("open");
		expect(machine.getAllowedActions()).toEqual(["close", "remove"]);
		expect(machine.isFinal()).toBe(false);
	});

	it("should resume from a given state", () => {
		const machine = new ContractStateMachine(DOOR, "closed");
		expect(machine.getState()).toBe("closed");
		expect(machine.getTransition("lock")?.to).toBe("locked");
	});

	it("should reject an unknown starting state", () => {
		expect(
			() => new ContractStateMachine<string, DoorAction, DoorContext>(DOOR, "ajar"),
		).toThrow(ContractError);
	});

	it("should run the side effect and move to the target state", async () => {
		const machine = new ContractStateMachine(DOOR);
		const ctx = context();

		const result = await machine.perform("close", ctx);

		expect(result).toEqual({
			previousState: "open",
			newState: "closed",
			action: "close",
		});
		expect(ctx.log).toEqual(["closing"]);
		expect(machine.getState()).toBe("closed");
	});

	it("should refuse actions not allowed from the current state", async () => {
		const machine = new ContractStateMachine(DOOR);
		expect(machine.canPerform("lock")).toBe(false);

		await expect(machine.perform("lock", context())).rejects.toMatchObject({
			code: "ACTION_NOT_ALLOWED",
		});
		expect(machine.getState()).toBe("open");
	});

	it("should enforce guards", async () => {
		const machine = new ContractStateMachine(DOOR, "closed");

		await expect(machine.perform("lock", context(false))).rejects.toMatchObject({
			code: "GUARD_FAILED",
		});
		await machine.perform("lock", context(true));
		expect(machine.getState()).toBe("locked");
	});

	it("should report final states", () => {
		expect(new ContractStateMachine(DOOR, "removed").isFinal()).toBe(true);
		expect(new ContractStateMachine(DOOR, "locked").isFinal()).toBe(false);
	});

	it("should keep the state when the side effect fails", async () => {
		const machine = new ContractStateMachine(DOOR);

		await expect(machine.perform("remove", context())).rejects.toThrow(
			"hinges stuck",
		);
		expect(machine.getState()).toBe("open");
		expect(machine.isFinal()).toBe(false);
	});
});

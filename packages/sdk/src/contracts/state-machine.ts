/**
 * Contract State Machine
 *
 * A generic state machine for managing contract lifecycle states and transitions.
 * Supports guards and side effects.
 */

import {
	ActionResult,
	StateMachineConfig,
	StateDefinition,
	StateTransition,
	ContractError,
} from "./types.js";

/**
 * Generic state machine for contract lifecycle management.
 *
 * This state machine supports:
 * - Typed states, actions and transition context
 * - Guard conditions
 * - Side effects that run before the state changes
 * - State introspection
 *
 * @example
 * ```typescript
 * type DoorState = "open" | "closed";
 * type DoorAction = "close" | "open";
 *
 * const config: StateMachineConfig<DoorState, DoorAction> = {
 *   initialState: "open",
 *   states: [
 *     createState("open", ["close"]),
 *     createState("closed", ["open"]),
 *   ],
 *   transitions: [
 *     createTransition("open", "close", "closed"),
 *     createTransition("closed", "open", "open"),
 *   ],
 * };
 *
 * const machine = new ContractStateMachine(config);
 * await machine.perform("close", undefined);
 * console.log(machine.getState()); // "closed"
 * ```
 */
export class ContractStateMachine<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	private currentState: TState;
	private readonly config: StateMachineConfig<TState, TAction, TContext>;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<
		string,
		StateTransition<TState, TAction, TContext>
	>;

	constructor(
		config: StateMachineConfig<TState, TAction, TContext>,
		initialState?: TState,
	) {
		this.config = config;

		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}

		const start = initialState ?? config.initialState;
		if (!this.stateMap.has(start)) {
			throw new ContractError(`Unknown state: ${start}`, "UNKNOWN_STATE", {
				state: start,
				validStates: Array.from(this.stateMap.keys()),
			});
		}
		this.currentState = start;
	}

	/**
	 * Get the current state.
	 */
	getState(): TState {
		return this.currentState;
	}

	/**
	 * Check if an action is allowed from the current state.
	 */
	canPerform(action: TAction): boolean {
		const state = this.stateMap.get(this.currentState);
		return state?.allowedActions.includes(action) ?? false;
	}

	/**
	 * Get the list of allowed actions from the current state.
	 */
	getAllowedActions(): TAction[] {
		const state = this.stateMap.get(this.currentState);
		return state ? [...state.allowedActions] : [];
	}

	/**
	 * Get the transition for an action from the current state.
	 */
	getTransition(
		action: TAction,
	): StateTransition<TState, TAction, TContext> | undefined {
		return this.transitionMap.get(`${this.currentState}:${action}`);
	}

	/**
	 * Perform an action, transitioning state if valid.
	 *
	 * The side effect of the transition runs first; the state only changes
	 * once it has resolved.
	 *
	 * @throws ContractError if action is not allowed or guard fails
	 */
	async perform(
		action: TAction,
		context: TContext,
	): Promise<ActionResult<TState, TAction>> {
		if (!this.canPerform(action)) {
			throw new ContractError(
				`Action "${action}" is not allowed from state "${this.currentState}"`,
				"ACTION_NOT_ALLOWED",
				{
					action,
					currentState: this.currentState,
					allowedActions: this.getAllowedActions(),
				},
			);
		}

		const transition = this.getTransition(action);
		if (!transition) {
			throw new ContractError(
				`No transition found for action "${action}" from state "${this.currentState}"`,
				"TRANSITION_NOT_FOUND",
				{ action, currentState: this.currentState },
			);
		}

		if (transition.guard && !transition.guard(context)) {
			throw new ContractError(
				`Guard condition failed for action "${action}"`,
				"GUARD_FAILED",
				{ action, currentState: this.currentState },
			);
		}

		if (transition.onTransition) {
			await transition.onTransition(context);
		}

		const previousState = this.currentState;
		this.currentState = transition.to;

		return { previousState, newState: this.currentState, action };
	}

	/**
	 * Check if the current state is a final (terminal) state.
	 */
	isFinal(): boolean {
		return this.stateMap.get(this.currentState)?.isFinal ?? false;
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<
	TState extends string,
	TAction extends string,
	TContext = unknown,
>(
	from: TState | TState[],
	action: TAction,
	to: TState,
	options: {
		guard?: (context: TContext) => boolean;
		onTransition?: (context: TContext) => void | Promise<void>;
	} = {},
): StateTransition<TState, TAction, TContext> {
	return {
		from,
		action,
		to,
		...options,
	};
}

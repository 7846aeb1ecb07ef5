/**
 * Contract layer types
 *
 * Types for defining contract state machines and lifecycle management.
 */

/**
 * Generic state definition for a contract state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
	/** Optional guard condition that must be true for transition to occur */
	guard?: (context: TContext) => boolean;
	/**
	 * Side effect executed before the state changes.
	 * If it throws, the machine stays in its current state.
	 */
	onTransition?: (context: TContext) => void | Promise<void>;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	/** Initial state when contract is created */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction, TContext>[];
}

/**
 * Contract action result.
 */
export interface ActionResult<TState extends string, TAction extends string> {
	/** Previous state */
	previousState: TState;
	/** New state after action */
	newState: TState;
	/** The action that was performed */
	action: TAction;
}

/**
 * Error thrown during contract operations.
 */
export class ContractError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "ContractError";
	}
}

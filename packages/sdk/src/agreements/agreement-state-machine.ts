/**
 * Agreement State Machine Configuration
 *
 * Defines the state machine for the escrow agreement lifecycle.
 */

import {
	ContractStateMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../contracts/index.js";
import { EscrowError } from "./errors.js";
import {
	AgreementAction,
	AgreementRole,
	AgreementStatus,
	AgreementTransitionContext,
	EscrowBalance,
} from "./types.js";

function heldBalance(context: AgreementTransitionContext): EscrowBalance {
	if (!context.balance) {
		throw new EscrowError(
			"NOT_FOUND",
			`No escrow balance held for agreement ${context.agreement.id}`,
			{ agreementId: context.agreement.id },
		);
	}
	return context.balance;
}

/**
 * Escrow agreement state machine.
 *
 * States:
 * - pending: Initial state, waiting for the buyer's deposit
 * - funded: Amount held in custody
 * - accepted: Buyer acknowledged, can complete or dispute
 * - disputed: Waiting for the arbiter
 * - completed: Custody released to the vendor (terminal)
 * - refunded: Custody returned to the buyer (terminal)
 *
 * Fund-moving transitions carry the transfer as their side effect, so a
 * failed transfer leaves the agreement in its previous status.
 */
export const AGREEMENT_STATE_MACHINE: StateMachineConfig<
	AgreementStatus,
	AgreementAction,
	AgreementTransitionContext
> = {
	initialState: "pending",
	states: [
		createState<AgreementStatus, AgreementAction>("pending", ["fund"], {
			description: "Agreement created, waiting for the buyer's deposit",
		}),
		createState<AgreementStatus, AgreementAction>("funded", ["accept"], {
			description: "Amount held in custody",
		}),
		createState<AgreementStatus, AgreementAction>(
			"accepted",
			["complete", "dispute"],
			{ description: "Buyer acknowledged the agreement" },
		),
		createState<AgreementStatus, AgreementAction>("disputed", ["refund"], {
			description: "Under arbitration",
		}),
		createState<AgreementStatus, AgreementAction>("completed", [], {
			isFinal: true,
			description: "Custody released to the vendor",
		}),
		createState<AgreementStatus, AgreementAction>("refunded", [], {
			isFinal: true,
			description: "Custody returned to the buyer",
		}),
	],
	transitions: [
		createTransition<AgreementStatus, AgreementAction, AgreementTransitionContext>(
			"pending",
			"fund",
			"funded",
			{
				onTransition: ({ agreement, custodian, moveFunds }) =>
					moveFunds(agreement.amount, agreement.buyer, custodian),
			},
		),
		createTransition<AgreementStatus, AgreementAction, AgreementTransitionContext>(
			"funded",
			"accept",
			"accepted",
		),
		createTransition<AgreementStatus, AgreementAction, AgreementTransitionContext>(
			"accepted",
			"complete",
			"completed",
			{
				onTransition: (context) =>
					context.moveFunds(
						heldBalance(context).balance,
						context.custodian,
						context.agreement.vendor,
					),
			},
		),
		createTransition<AgreementStatus, AgreementAction, AgreementTransitionContext>(
			"accepted",
			"dispute",
			"disputed",
		),
		createTransition<AgreementStatus, AgreementAction, AgreementTransitionContext>(
			"disputed",
			"refund",
			"refunded",
			{
				onTransition: (context) =>
					context.moveFunds(
						heldBalance(context).balance,
						context.custodian,
						context.agreement.buyer,
					),
			},
		),
	],
};

/**
 * Role the caller must hold for each action.
 */
export const ACTION_ROLES: Readonly<Record<AgreementAction, AgreementRole>> = {
	fund: "buyer",
	accept: "buyer",
	complete: "buyer",
	dispute: "buyer",
	refund: "arbiter",
};

/**
 * Check if a status means funds are held in custody.
 */
export function holdsCustody(status: AgreementStatus): boolean {
	switch (status) {
		case "funded":
		case "accepted":
		case "disputed":
			return true;
		case "pending":
		case "completed":
		case "refunded":
			return false;
	}
}

/**
 * Check if a status is a terminal status.
 */
export function isFinalStatus(status: AgreementStatus): boolean {
	return new ContractStateMachine(AGREEMENT_STATE_MACHINE, status).isFinal();
}

/**
 * Get the allowed actions for a status.
 */
export function getAllowedActions(status: AgreementStatus): AgreementAction[] {
	return new ContractStateMachine(
		AGREEMENT_STATE_MACHINE,
		status,
	).getAllowedActions();
}

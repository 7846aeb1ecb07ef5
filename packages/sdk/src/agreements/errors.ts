import { ContractError } from "../contracts/index.js";

export type EscrowErrorCode =
	| "NOT_AUTHORIZED"
	| "ALREADY_EXISTS"
	| "INVALID_STATUS"
	| "INSUFFICIENT_FUNDS"
	| "NOT_FOUND"
	| "INVALID_ARGUMENT";

/**
 * Stable numeric codes reported alongside each error.
 */
export const ESCROW_ERROR_NUMBERS: Readonly<
	Record<Exclude<EscrowErrorCode, "INVALID_ARGUMENT">, number>
> = {
	NOT_AUTHORIZED: 100,
	ALREADY_EXISTS: 101,
	INVALID_STATUS: 102,
	INSUFFICIENT_FUNDS: 103,
	NOT_FOUND: 104,
};

/**
 * Error thrown by the escrow engine. Every escrow error leaves the
 * agreement exactly as it was before the call.
 */
export class EscrowError extends ContractError {
	declare readonly code: EscrowErrorCode;

	constructor(
		code: EscrowErrorCode,
		message: string,
		details?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, code, details);
		this.name = "EscrowError";
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
	}

	get errorNumber(): number | undefined {
		return this.code === "INVALID_ARGUMENT"
			? undefined
			: ESCROW_ERROR_NUMBERS[this.code];
	}
}

export function isEscrowError(
	err: unknown,
	code?: EscrowErrorCode,
): err is EscrowError {
	return err instanceof EscrowError && (code === undefined || err.code === code);
}

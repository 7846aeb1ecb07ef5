import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { AuthenticatedRequest } from "./auth.guard";

/**
 * Identity of the caller authenticated by AuthGuard.
 */
export const CallerFromJwt = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!req.caller) {
			throw new UnauthorizedException();
		}
		return req.caller.identity;
	},
);

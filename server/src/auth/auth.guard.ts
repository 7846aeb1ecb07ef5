import {
	CanActivate,
	ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { AuthService, CallerSession } from "./auth.service";

export type AuthenticatedRequest = Request & { caller?: CallerSession };

@Injectable()
export class AuthGuard implements CanActivate {
	constructor(private readonly auth: AuthService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const header = req.header("authorization");
		if (!header || !header.startsWith("Bearer ")) {
			throw new UnauthorizedException("Missing bearer token");
		}
		req.caller = await this.auth.getSession(
			header.slice("Bearer ".length).trim(),
		);
		return true;
	}
}

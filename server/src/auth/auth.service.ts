import { Injectable, Logger, UnauthorizedException } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { errorMessage } from "../common/errors";

export const TOKEN_TTL_SECONDS = 60 * 60;

export type CallerSession = {
	identity: string;
};

export type IssuedToken = {
	accessToken: string;
	identity: string;
	expiresAt: string;
};

type TokenPayload = {
	sub: string;
};

function isTokenPayload(value: unknown): value is TokenPayload {
	return (
		typeof value === "object" &&
		value !== null &&
		"sub" in value &&
		typeof value.sub === "string" &&
		value.sub.length > 0
	);
}

/**
 * Issues and verifies the bearer tokens carrying a caller identity.
 * Tokens are only issued through the backoffice.
 */
@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(private readonly jwt: JwtService) {}

	async issueToken(identity: string): Promise<IssuedToken> {
		const payload: TokenPayload = { sub: identity };
		const accessToken = await this.jwt.signAsync(payload, {
			expiresIn: TOKEN_TTL_SECONDS,
		});
		this.logger.log(`Issued token for ${identity}`);
		return {
			accessToken,
			identity,
			expiresAt: new Date(Date.now() + TOKEN_TTL_SECONDS * 1000).toISOString(),
		};
	}

	async getSession(token: string): Promise<CallerSession> {
		let payload: unknown;
		try {
			payload = await this.jwt.verifyAsync<TokenPayload>(token);
		} catch (cause) {
			this.logger.debug(`Rejected token: ${errorMessage(cause)}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (!isTokenPayload(payload)) {
			throw new UnauthorizedException("Invalid token");
		}
		return { identity: payload.sub };
	}
}

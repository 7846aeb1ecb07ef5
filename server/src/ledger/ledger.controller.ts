import { Controller, Get, UseGuards } from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { CallerFromJwt } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { AccountsLedgerService } from "./accounts-ledger.service";
import { GetLedgerBalanceDto } from "./dto/get-ledger-balance.dto";

@ApiTags("3 - Ledger")
@ApiExtraModels(GetLedgerBalanceDto)
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(private readonly ledger: AccountsLedgerService) {}

	@Get("balance")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Get the authenticated caller's ledger balance" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetLedgerBalanceDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getBalance(
		@CallerFromJwt() identity: string,
	): Promise<ApiEnvelope<GetLedgerBalanceDto>> {
		const balance = await this.ledger.balanceOf(identity);
		return envelope({ identity, balance });
	}
}

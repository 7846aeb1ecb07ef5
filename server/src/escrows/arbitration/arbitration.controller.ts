import {
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	Patch,
	Query,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../../auth/auth.guard";
import { CallerFromJwt } from "../../auth/caller.decorator";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../../common/dto/envelopes";
import { ParseCursorPipe } from "../../common/pipes/cursor.pipe";
import { AgreementsService } from "../agreements/agreements.service";
import { GetAgreementDto } from "../agreements/dto/get-agreement.dto";

@ApiTags("2 - Arbitration")
@Controller("api/v1/escrows/arbitration")
export class ArbitrationController {
	constructor(private readonly agreements: AgreementsService) {}

	@Get("disputes")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "List disputed agreements (arbiter only)" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetAgreementDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the arbiter" })
	async getDisputes(
		@CallerFromJwt() caller: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetAgreementDto[]>> {
		const { items, nextCursor, total } = await this.agreements.getDisputes(
			caller,
			Math.min(Math.max(limit, 1), 100),
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Patch("agreements/:agreementId/refund")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Return custody of a disputed agreement to the buyer" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAgreementDto) })
	@ApiForbiddenResponse({ description: "Caller is not the arbiter" })
	@ApiUnprocessableEntityResponse({ description: "Agreement is not disputed" })
	async refund(
		@CallerFromJwt() caller: string,
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.agreements.refund(caller, agreementId));
	}
}

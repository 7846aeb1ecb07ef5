import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	ParseEnumPipe,
	Patch,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiResponse,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { AGREEMENT_STATUSES, type AgreementStatus } from "@bridgarr/sdk";
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
import {
	ServerSentEventsService,
	SseEvent,
} from "../../common/server-sent-events.service";
import { AgreementsService } from "./agreements.service";
import { CreateAgreementInDto } from "./dto/create-agreement.dto";
import { GetAgreementDto } from "./dto/get-agreement.dto";
import { GetEscrowBalanceDto } from "./dto/get-escrow-balance.dto";

@ApiTags("1 - Escrow Agreements")
@ApiExtraModels(GetAgreementDto, GetEscrowBalanceDto)
@Controller("api/v1/escrows/agreements")
export class AgreementsController {
	constructor(
		private readonly service: AgreementsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "List agreements where the caller is vendor or buyer" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiQuery({
		name: "status",
		required: false,
		description: "Filter by status",
		schema: { type: "string", enum: AGREEMENT_STATUSES.slice(0) },
	})
	@ApiOkResponse({
		description: "A page of the caller's agreements",
		schema: getSchemaPathForPaginatedDto(GetAgreementDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getMine(
		@CallerFromJwt() caller: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("status", new ParseEnumPipe(AGREEMENT_STATUSES, { optional: true }))
		status?: AgreementStatus,
	): Promise<ApiPaginatedEnvelope<GetAgreementDto[]>> {
		const { items, nextCursor, total } = await this.service.getByParty(
			caller,
			{ status },
			Math.min(Math.max(limit, 1), 100),
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Post("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Create an agreement; the caller becomes the vendor" })
	@ApiBody({ type: CreateAgreementInDto })
	@ApiCreatedResponse({
		description: "Agreement created with status `pending`",
		schema: getSchemaPathForDto(GetAgreementDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiConflictResponse({ description: "Agreement id already taken" })
	async create(
		@Body() dto: CreateAgreementInDto,
		@CallerFromJwt() caller: string,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.service.create(caller, dto));
	}

	@Sse("sse")
	@ApiOperation({ summary: "Subscribe to agreement events" })
	@ApiQuery({ name: "id", required: false, description: "Agreement id" })
	sse(
		@Query("id", new ParseIntPipe({ optional: true })) id?: number,
	): Observable<SseEvent> {
		return this.sseService.agreementEvents(id).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@Get(":agreementId")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Retrieve an agreement by id" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAgreementDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiNotFoundResponse({ description: "Agreement not found" })
	async getOne(
		@CallerFromJwt() caller: string,
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.service.getOne(agreementId, caller));
	}

	@Get(":agreementId/escrow-balance")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Amount held in custody for an agreement" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowBalanceDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiNotFoundResponse({ description: "Nothing held for this agreement" })
	async getEscrowBalance(
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetEscrowBalanceDto>> {
		return envelope(await this.service.getEscrowBalance(agreementId));
	}

	@Patch(":agreementId/fund")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Buyer deposits the amount into custody" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAgreementDto) })
	@ApiResponse({ status: 402, description: "Buyer balance too low" })
	@ApiForbiddenResponse({ description: "Caller is not the buyer" })
	@ApiUnprocessableEntityResponse({ description: "Agreement is not pending" })
	async fund(
		@CallerFromJwt() caller: string,
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.service.fund(caller, agreementId));
	}

	@Patch(":agreementId/accept")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Buyer acknowledges a funded agreement" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAgreementDto) })
	@ApiForbiddenResponse({ description: "Caller is not the buyer" })
	@ApiUnprocessableEntityResponse({ description: "Agreement is not funded" })
	async accept(
		@CallerFromJwt() caller: string,
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.service.accept(caller, agreementId));
	}

	@Patch(":agreementId/complete")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Buyer releases custody to the vendor" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAgreementDto) })
	@ApiForbiddenResponse({ description: "Caller is not the buyer" })
	@ApiUnprocessableEntityResponse({ description: "Agreement is not accepted" })
	async complete(
		@CallerFromJwt() caller: string,
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.service.complete(caller, agreementId));
	}

	@Patch(":agreementId/dispute")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Buyer disputes an accepted agreement" })
	@ApiParam({ name: "agreementId", description: "Agreement id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAgreementDto) })
	@ApiForbiddenResponse({ description: "Caller is not the buyer" })
	@ApiUnprocessableEntityResponse({ description: "Agreement is not accepted" })
	async dispute(
		@CallerFromJwt() caller: string,
		@Param("agreementId", ParseIntPipe) agreementId: number,
	): Promise<ApiEnvelope<GetAgreementDto>> {
		return envelope(await this.service.dispute(caller, agreementId));
	}
}

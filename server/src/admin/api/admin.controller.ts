import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	ParseEnumPipe,
	ParseIntPipe,
	Post,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { AGREEMENT_STATUSES, type AgreementStatus } from "@bridgarr/sdk";
import { ParseCursorPipe } from "../../common/pipes/cursor.pipe";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../../common/dto/envelopes";
import {
	ServerSentEventsService,
	SseEvent,
} from "../../common/server-sent-events.service";
import { AuthService } from "../../auth/auth.service";
import {
	IssueTokenInDto,
	IssueTokenOutDto,
} from "../../auth/dto/issue-token.dto";
import { AgreementsService } from "../../escrows/agreements/agreements.service";
import { GetAgreementDto } from "../../escrows/agreements/dto/get-agreement.dto";
import { AccountsLedgerService } from "../../ledger/accounts-ledger.service";
import { AdminService } from "./admin.service";
import { DepositInDto, DepositOutDto } from "./dto/deposit-in.dto";
import { GetAdminStatsDto } from "./dto/get-admin-stats.dto";

@ApiTags("Admin")
@ApiBasicAuth()
@ApiExtraModels(IssueTokenOutDto, DepositOutDto, GetAdminStatsDto)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly adminService: AdminService,
		private readonly agreements: AgreementsService,
		private readonly ledger: AccountsLedgerService,
		private readonly auth: AuthService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@ApiOperation({ summary: "List all agreements paginated" })
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
		schema: { type: "string", enum: AGREEMENT_STATUSES.slice(0) },
	})
	@ApiOkResponse({
		description: "A page of all agreements",
		schema: getSchemaPathForPaginatedDto(GetAgreementDto),
	})
	@Get("agreements")
	async allAgreements(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("status", new ParseEnumPipe(AGREEMENT_STATUSES, { optional: true }))
		status?: AgreementStatus,
	): Promise<ApiPaginatedEnvelope<GetAgreementDto[]>> {
		const { items, nextCursor, total } = await this.agreements.getAll(
			{ status },
			Math.min(Math.max(limit, 1), 100),
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@ApiOperation({ summary: "Agreement and custody totals" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAdminStatsDto) })
	@Get("stats")
	async stats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope(await this.adminService.getStats());
	}

	@ApiOperation({ summary: "Credit a ledger account" })
	@ApiBody({ type: DepositInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(DepositOutDto) })
	@Post("ledger/deposits")
	@HttpCode(HttpStatus.OK)
	async deposit(
		@Body() dto: DepositInDto,
	): Promise<ApiEnvelope<DepositOutDto>> {
		const balance = await this.ledger.deposit(dto.identity, dto.amount);
		return envelope({ identity: dto.identity, balance });
	}

	@ApiOperation({ summary: "Issue a bearer token for an identity" })
	@ApiBody({ type: IssueTokenInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(IssueTokenOutDto) })
	@Post("auth/tokens")
	@HttpCode(HttpStatus.OK)
	async issueToken(
		@Body() dto: IssueTokenInDto,
	): Promise<ApiEnvelope<IssueTokenOutDto>> {
		return envelope(await this.auth.issueToken(dto.identity));
	}

	@Sse("sse")
	@ApiOperation({ summary: "Subscribe to every agreement event" })
	sse(): Observable<SseEvent> {
		return this.sseService.adminEvents.pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}

import {
	BadRequestException,
	ConflictException,
	ForbiddenException,
	HttpException,
	HttpStatus,
	Inject,
	Injectable,
	Logger,
	NotFoundException,
	UnprocessableEntityException,
} from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import {
	AGREEMENT_STATUSES,
	Agreement,
	AgreementAction,
	AgreementQuery,
	AgreementStatus,
	EscrowEngine,
	EscrowError,
	isFinalStatus,
} from "@bridgarr/sdk";
import {
	AGREEMENT_CREATED_ID,
	AGREEMENT_TRANSITIONED_ID,
	type AgreementCreated,
	type AgreementTransitioned,
} from "../../common/agreement.event";
import { Cursor, cursorToString } from "../../common/dto/envelopes";
import { toError } from "../../common/errors";
import { CreateAgreementInDto } from "./dto/create-agreement.dto";
import { GetAgreementDto } from "./dto/get-agreement.dto";
import { GetEscrowBalanceDto } from "./dto/get-escrow-balance.dto";
import { ESCROW_ENGINE } from "./escrow-engine.provider";

export type AgreementPage = {
	items: GetAgreementDto[];
	nextCursor?: string;
	total: number;
};

type AgreementQueryFilter = {
	status?: AgreementStatus;
};

@Injectable()
export class AgreementsService {
	private readonly logger = new Logger(AgreementsService.name);

	constructor(
		@Inject(ESCROW_ENGINE) private readonly engine: EscrowEngine,
		private readonly events: EventEmitter2,
	) {}

	get arbiter(): string {
		return this.engine.arbiter;
	}

	get custodian(): string {
		return this.engine.custodian;
	}

	async create(
		caller: string,
		input: CreateAgreementInDto,
	): Promise<GetAgreementDto> {
		const id = await this.run(() =>
			this.engine.createAgreement(caller, {
				buyer: input.buyer,
				amount: input.amount,
				description: input.description,
			}),
		);
		const agreement = await this.findOrThrow(id);
		this.events.emit(AGREEMENT_CREATED_ID, {
			eventId: nanoid(4),
			agreementId: agreement.id,
			vendor: agreement.vendor,
			buyer: agreement.buyer,
			amount: agreement.amount,
			createdAt: new Date(agreement.createdAt).toISOString(),
		} satisfies AgreementCreated);
		return this.toDto(agreement, caller);
	}

	fund(caller: string, id: number): Promise<GetAgreementDto> {
		return this.transition(caller, id, "fund");
	}

	accept(caller: string, id: number): Promise<GetAgreementDto> {
		return this.transition(caller, id, "accept");
	}

	complete(caller: string, id: number): Promise<GetAgreementDto> {
		return this.transition(caller, id, "complete");
	}

	dispute(caller: string, id: number): Promise<GetAgreementDto> {
		return this.transition(caller, id, "dispute");
	}

	refund(caller: string, id: number): Promise<GetAgreementDto> {
		return this.transition(caller, id, "refund");
	}

	async getOne(id: number, caller: string): Promise<GetAgreementDto> {
		const agreement = await this.findOrThrow(id);
		return this.toDto(agreement, caller);
	}

	async getEscrowBalance(id: number): Promise<GetEscrowBalanceDto> {
		const balance = await this.engine.getEscrowBalance(id);
		if (!balance) {
			throw new NotFoundException(`No escrow balance held for agreement ${id}`);
		}
		return { agreementId: balance.agreementId, balance: balance.balance };
	}

	async getByParty(
		caller: string,
		filter: AgreementQueryFilter,
		limit: number,
		cursor: Cursor,
	): Promise<AgreementPage> {
		return this.page(
			{ party: caller, status: filter.status },
			limit,
			cursor,
			caller,
		);
	}

	async getDisputes(
		caller: string,
		limit: number,
		cursor: Cursor,
	): Promise<AgreementPage> {
		if (caller !== this.engine.arbiter) {
			throw new ForbiddenException("Only the arbiter can list disputes");
		}
		return this.page({ status: "disputed" }, limit, cursor, caller);
	}

	/**
	 * Every agreement, for the backoffice. `allowedActions` is computed for
	 * the arbiter.
	 */
	async getAll(
		filter: AgreementQueryFilter,
		limit: number,
		cursor: Cursor,
	): Promise<AgreementPage> {
		return this.page(
			{ status: filter.status },
			limit,
			cursor,
			this.engine.arbiter,
		);
	}

	async countByStatus(): Promise<Record<AgreementStatus, number>> {
		const counts = await Promise.all(
			AGREEMENT_STATUSES.map(async (status) => {
				const { total } = await this.engine.listAgreements({
					status,
					limit: 1,
				});
				return [status, total] as const;
			}),
		);
		const byStatus: Record<AgreementStatus, number> = {
			pending: 0,
			funded: 0,
			accepted: 0,
			completed: 0,
			disputed: 0,
			refunded: 0,
		};
		for (const [status, total] of counts) {
			byStatus[status] = total;
		}
		return byStatus;
	}

	private async page(
		query: Omit<AgreementQuery, "beforeId" | "limit">,
		limit: number,
		cursor: Cursor,
		viewer: string,
	): Promise<AgreementPage> {
		const { items, total, hasMore } = await this.engine.listAgreements({
			...query,
			beforeId: cursor.idBefore,
			limit,
		});
		const last = items.at(-1);
		const dtos = await Promise.all(items.map((a) => this.toDto(a, viewer)));
		return {
			items: dtos,
			total,
			nextCursor: hasMore && last ? cursorToString(last.id) : undefined,
		};
	}

	private async transition(
		caller: string,
		id: number,
		action: AgreementAction,
	): Promise<GetAgreementDto> {
		await this.run(() => {
			switch (action) {
				case "fund":
					return this.engine.fundAgreement(caller, id);
				case "accept":
					return this.engine.acceptAgreement(caller, id);
				case "complete":
					return this.engine.completeAgreement(caller, id);
				case "dispute":
					return this.engine.disputeAgreement(caller, id);
				case "refund":
					return this.engine.refundAgreement(caller, id);
			}
		});
		const agreement = await this.findOrThrow(id);
		this.events.emit(AGREEMENT_TRANSITIONED_ID, {
			eventId: nanoid(4),
			agreementId: id,
			action,
			status: agreement.status,
			by: caller,
			transitionedAt: new Date().toISOString(),
		} satisfies AgreementTransitioned);
		return this.toDto(agreement, caller);
	}

	private async findOrThrow(id: number): Promise<Agreement> {
		const agreement = await this.engine.getAgreement(id);
		if (!agreement) {
			throw new NotFoundException(`Agreement ${id} not found`);
		}
		return agreement;
	}

	private async toDto(
		agreement: Agreement,
		viewer: string,
	): Promise<GetAgreementDto> {
		const balance = await this.engine.getEscrowBalance(agreement.id);
		return {
			id: agreement.id,
			vendor: agreement.vendor,
			buyer: agreement.buyer,
			amount: agreement.amount,
			description: agreement.description,
			status: agreement.status,
			escrowBalance: balance?.balance ?? null,
			allowedActions: this.engine.allowedActionsFor(agreement, viewer),
			isFinal: isFinalStatus(agreement.status),
			createdAt: agreement.createdAt,
		};
	}

	private async run<T>(operation: () => Promise<T>): Promise<T> {
		try {
			return await operation();
		} catch (error) {
			throw this.toHttpException(error);
		}
	}

	private toHttpException(error: unknown): Error {
		if (!(error instanceof EscrowError)) {
			const err = toError(error);
			this.logger.error(`Escrow operation failed: ${err.message}`, err.stack);
			return err;
		}
		const body = {
			message: error.message,
			code: error.code,
			errorNumber: error.errorNumber,
			details: error.details,
		};
		switch (error.code) {
			case "NOT_FOUND":
				return new NotFoundException(body);
			case "NOT_AUTHORIZED":
				return new ForbiddenException(body);
			case "INVALID_STATUS":
				return new UnprocessableEntityException(body);
			case "ALREADY_EXISTS":
				return new ConflictException(body);
			case "INSUFFICIENT_FUNDS":
				return new HttpException(body, HttpStatus.PAYMENT_REQUIRED);
			case "INVALID_ARGUMENT":
				return new BadRequestException(body);
		}
	}
}

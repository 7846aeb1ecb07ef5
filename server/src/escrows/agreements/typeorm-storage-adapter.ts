/**
 * TypeORM Storage Adapter
 *
 * Implements the SDK's AgreementStorage interface on top of the
 * `agreements`, `escrow_balances` and `engine_counters` tables. Each write
 * runs in a single transaction.
 */

import { Brackets, DataSource, EntityManager, QueryFailedError } from "typeorm";
import {
	Agreement,
	AgreementId,
	AgreementQuery,
	AgreementStatus,
	AgreementStorage,
	BalanceWrite,
	EscrowBalance,
	QueryResult,
	StorageError,
} from "@bridgarr/sdk";
import { EscrowAgreement } from "./escrow-agreement.entity";
import { CustodyBalance } from "./custody-balance.entity";
import { EngineCounter, NEXT_AGREEMENT_ID } from "./engine-counter.entity";

const UNIQUE_VIOLATION_CODES = new Set([
	"SQLITE_CONSTRAINT_PRIMARYKEY",
	"SQLITE_CONSTRAINT_UNIQUE",
]);

function isUniqueViolation(error: QueryFailedError): boolean {
	const driverError: unknown = error.driverError;
	return (
		typeof driverError === "object" &&
		driverError !== null &&
		"code" in driverError &&
		typeof driverError.code === "string" &&
		UNIQUE_VIOLATION_CODES.has(driverError.code)
	);
}

/**
 * @example
 * ```typescript
 * const storage = new TypeOrmStorageAdapter(dataSource);
 * const engine = new EscrowEngine({ storage, ledger, arbiter, custodian });
 * ```
 */
export class TypeOrmStorageAdapter implements AgreementStorage {
	constructor(private readonly dataSource: DataSource) {}

	async loadAgreement(id: AgreementId): Promise<Agreement | null> {
		const entity = await this.dataSource
			.getRepository(EscrowAgreement)
			.findOneBy({ id });
		return entity ? this.entityToAgreement(entity) : null;
	}

	async hasAgreement(id: AgreementId): Promise<boolean> {
		const count = await this.dataSource
			.getRepository(EscrowAgreement)
			.countBy({ id });
		return count > 0;
	}

	async loadBalance(id: AgreementId): Promise<EscrowBalance | null> {
		const entity = await this.dataSource
			.getRepository(CustodyBalance)
			.findOneBy({ agreementId: id });
		return entity
			? { agreementId: entity.agreementId, balance: entity.balance }
			: null;
	}

	async currentId(): Promise<number> {
		const counter = await this.dataSource
			.getRepository(EngineCounter)
			.findOneBy({ name: NEXT_AGREEMENT_ID });
		// the counter stores the id the next agreement will take
		return counter ? counter.value - 1 : 0;
	}

	async insertAgreement(agreement: Agreement): Promise<void> {
		try {
			await this.dataSource.transaction(async (manager) => {
				await manager.insert(EscrowAgreement, {
					id: agreement.id,
					vendor: agreement.vendor,
					buyer: agreement.buyer,
					amount: agreement.amount,
					description: agreement.description,
					status: agreement.status,
					createdAt: agreement.createdAt,
				});
				await this.advanceCounter(manager, agreement.id);
			});
		} catch (error) {
			if (error instanceof QueryFailedError && isUniqueViolation(error)) {
				throw new StorageError(
					`Agreement ${agreement.id} already stored`,
					"DUPLICATE_KEY",
					{ id: agreement.id },
				);
			}
			throw error;
		}
	}

	async commitTransition(
		agreement: Agreement,
		previousStatus: AgreementStatus,
		balance: BalanceWrite,
	): Promise<void> {
		await this.dataSource.transaction(async (manager) => {
			const stored = await manager.findOneBy(EscrowAgreement, {
				id: agreement.id,
			});
			if (!stored) {
				throw new StorageError(
					`Agreement ${agreement.id} not stored`,
					"MISSING_KEY",
					{ id: agreement.id },
				);
			}
			// only the status of a stored agreement ever changes
			const result = await manager.update(
				EscrowAgreement,
				{ id: agreement.id, status: previousStatus },
				{ status: agreement.status },
			);
			if (result.affected !== 1) {
				throw new StorageError(
					`Agreement ${agreement.id} is ${stored.status}, expected ${previousStatus}`,
					"STALE_STATUS",
					{
						id: agreement.id,
						status: stored.status,
						expected: previousStatus,
					},
				);
			}
			switch (balance.kind) {
				case "create":
					await manager.insert(CustodyBalance, {
						agreementId: balance.balance.agreementId,
						balance: balance.balance.balance,
					});
					break;
				case "delete":
					await manager.delete(CustodyBalance, { agreementId: agreement.id });
					break;
				case "none":
					break;
			}
		});
	}

	async query(options?: AgreementQuery): Promise<QueryResult<Agreement>> {
		const qb = this.dataSource
			.getRepository(EscrowAgreement)
			.createQueryBuilder("a");

		if (options?.party) {
			const party = options.party;
			qb.andWhere(
				new Brackets((w) => {
					w.where("a.vendor = :party", { party }).orWhere(
						"a.buyer = :party",
						{ party },
					);
				}),
			);
		}

		if (options?.status) {
			const statuses = Array.isArray(options.status)
				? options.status
				: [options.status];
			qb.andWhere("a.status IN (:...statuses)", { statuses });
		}

		if (options?.beforeId !== undefined) {
			qb.andWhere("a.id < :beforeId", { beforeId: options.beforeId });
		}

		qb.orderBy("a.id", "DESC");
		if (options?.limit !== undefined) {
			qb.take(options.limit);
		}

		const [entities, total] = await qb.getManyAndCount();
		const items = entities.map((e) => this.entityToAgreement(e));
		return {
			items,
			total,
			hasMore: items.length < total,
		};
	}

	private async advanceCounter(
		manager: EntityManager,
		id: AgreementId,
	): Promise<void> {
		const counter = await manager.findOneBy(EngineCounter, {
			name: NEXT_AGREEMENT_ID,
		});
		const next = Math.max(counter?.value ?? 1, id + 1);
		await manager.save(EngineCounter, { name: NEXT_AGREEMENT_ID, value: next });
	}

	private entityToAgreement(entity: EscrowAgreement): Agreement {
		return {
			id: entity.id,
			vendor: entity.vendor,
			buyer: entity.buyer,
			amount: entity.amount,
			description: entity.description,
			status: entity.status,
			createdAt: entity.createdAt,
		};
	}
}

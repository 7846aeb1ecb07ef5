import { Logger, Provider } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { DataSource } from "typeorm";
import { MutexInterface } from "async-mutex";
import { EscrowEngine, LedgerGateway } from "@bridgarr/sdk";
import { DATABASE_WRITE_LOCK } from "../../common/database-write-lock";
import { LEDGER_GATEWAY } from "../../ledger/ledger.constants";
import { TypeOrmStorageAdapter } from "./typeorm-storage-adapter";

export const ESCROW_ENGINE = Symbol("ESCROW_ENGINE");

export const DEFAULT_CUSTODY_IDENTITY = "escrow-custody";

export const escrowEngineProvider: Provider = {
	provide: ESCROW_ENGINE,
	inject: [ConfigService, DataSource, LEDGER_GATEWAY, DATABASE_WRITE_LOCK],
	useFactory: (
		config: ConfigService,
		dataSource: DataSource,
		ledger: LedgerGateway,
		lock: MutexInterface,
	) => {
		const logger = new Logger(EscrowEngine.name);
		const arbiter = config.get<string>("ARBITER_IDENTITY");
		if (!arbiter) {
			throw new Error("ARBITER_IDENTITY is not set");
		}
		const custodian =
			config.get<string>("ESCROW_CUSTODY_IDENTITY") ?? DEFAULT_CUSTODY_IDENTITY;
		logger.log(`ARBITER_IDENTITY=${arbiter} ESCROW_CUSTODY_IDENTITY=${custodian}`);
		return new EscrowEngine({
			arbiter,
			custodian,
			storage: new TypeOrmStorageAdapter(dataSource),
			ledger,
			logger,
			lock,
		});
	},
};

import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import {
	DATABASE_WRITE_LOCK,
	databaseWriteLockProvider,
} from "../common/database-write-lock";
import { AccountsLedgerService } from "./accounts-ledger.service";
import { LEDGER_GATEWAY } from "./ledger.constants";
import { LedgerAccount } from "./ledger-account.entity";
import { LedgerController } from "./ledger.controller";

@Module({
	imports: [TypeOrmModule.forFeature([LedgerAccount]), AuthModule],
	providers: [
		databaseWriteLockProvider,
		AccountsLedgerService,
		{ provide: LEDGER_GATEWAY, useExisting: AccountsLedgerService },
	],
	controllers: [LedgerController],
	exports: [AccountsLedgerService, LEDGER_GATEWAY, DATABASE_WRITE_LOCK],
})
export class LedgerModule {}

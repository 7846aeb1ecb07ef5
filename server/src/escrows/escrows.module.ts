import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AuthModule } from "../auth/auth.module";
import { LedgerModule } from "../ledger/ledger.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { EscrowAgreement } from "./agreements/escrow-agreement.entity";
import { CustodyBalance } from "./agreements/custody-balance.entity";
import { EngineCounter } from "./agreements/engine-counter.entity";
import { escrowEngineProvider } from "./agreements/escrow-engine.provider";
import { AgreementsService } from "./agreements/agreements.service";
import { AgreementsController } from "./agreements/agreements.controller";
import { ArbitrationController } from "./arbitration/arbitration.controller";

@Module({
	imports: [
		TypeOrmModule.forFeature([EscrowAgreement, CustodyBalance, EngineCounter]),
		AuthModule,
		LedgerModule,
	],
	providers: [escrowEngineProvider, AgreementsService, ServerSentEventsService],
	controllers: [AgreementsController, ArbitrationController],
	exports: [AgreementsService, ServerSentEventsService],
})
export class EscrowsModule {}

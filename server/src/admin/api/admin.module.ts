import { Module } from "@nestjs/common";
import { AdminController } from "./admin.controller";
import { AdminService } from "./admin.service";
import { AuthModule } from "../../auth/auth.module";
import { EscrowsModule } from "../../escrows/escrows.module";
import { LedgerModule } from "../../ledger/ledger.module";

@Module({
	imports: [AuthModule, EscrowsModule, LedgerModule],
	controllers: [AdminController],
	providers: [AdminService],
})
export class AdminModule {}

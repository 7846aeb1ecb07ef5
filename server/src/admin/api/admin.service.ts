import { Injectable } from "@nestjs/common";
import { AgreementsService } from "../../escrows/agreements/agreements.service";
import { AccountsLedgerService } from "../../ledger/accounts-ledger.service";
import { GetAdminStatsDto } from "./dto/get-admin-stats.dto";

@Injectable()
export class AdminService {
	constructor(
		private readonly agreements: AgreementsService,
		private readonly ledger: AccountsLedgerService,
	) {}

	async getStats(): Promise<GetAdminStatsDto> {
		const byStatus = await this.agreements.countByStatus();
		const totalAgreements = Object.values(byStatus).reduce(
			(sum, n) => sum + n,
			0,
		);
		return {
			totalAgreements,
			byStatus,
			custodyBalance: await this.ledger.balanceOf(this.agreements.custodian),
		};
	}
}

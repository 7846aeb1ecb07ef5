import { ApiProperty } from "@nestjs/swagger";
import type { AgreementStatus } from "@bridgarr/sdk";

export class GetAdminStatsDto {
	@ApiProperty({ example: 12 })
	totalAgreements!: number;

	@ApiProperty({
		description: "Agreement count per status",
		example: {
			pending: 3,
			funded: 2,
			accepted: 1,
			completed: 4,
			disputed: 1,
			refunded: 1,
		},
	})
	byStatus!: Record<AgreementStatus, number>;

	@ApiProperty({ description: "Ledger balance of the custody account" })
	custodyBalance!: number;
}

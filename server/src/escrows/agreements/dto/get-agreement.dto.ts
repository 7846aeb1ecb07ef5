import { ApiProperty } from "@nestjs/swagger";
import {
	AGREEMENT_STATUSES,
	type AgreementAction,
	type AgreementStatus,
} from "@bridgarr/sdk";

const AGREEMENT_ACTIONS: AgreementAction[] = [
	"fund",
	"accept",
	"complete",
	"dispute",
	"refund",
];

export class GetAgreementDto {
	@ApiProperty({ example: 1 })
	id!: number;

	@ApiProperty({ description: "Vendor identity" })
	vendor!: string;

	@ApiProperty({ description: "Buyer identity" })
	buyer!: string;

	@ApiProperty({ minimum: 1, description: "Amount in the smallest unit" })
	amount!: number;

	@ApiProperty()
	description!: string;

	@ApiProperty({ enum: AGREEMENT_STATUSES.slice(0), default: "pending" })
	status!: AgreementStatus;

	@ApiProperty({
		description: "Amount currently held in custody, null when none",
		nullable: true,
		type: Number,
	})
	escrowBalance!: number | null;

	@ApiProperty({
		enum: AGREEMENT_ACTIONS,
		isArray: true,
		description: "Actions the caller may perform now",
	})
	allowedActions!: AgreementAction[];

	@ApiProperty({ description: "Whether the agreement reached a final status" })
	isFinal!: boolean;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;
}

import { ApiProperty } from "@nestjs/swagger";

export class GetEscrowBalanceDto {
	@ApiProperty({ example: 1 })
	agreementId!: number;

	@ApiProperty({ description: "Amount held in custody", example: 1000 })
	balance!: number;
}

import { ApiProperty } from "@nestjs/swagger";

export class GetLedgerBalanceDto {
	@ApiProperty({ example: "alice" })
	identity!: string;

	@ApiProperty({ description: "Balance in the smallest unit", example: 5000 })
	balance!: number;
}

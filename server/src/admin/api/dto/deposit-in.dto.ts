import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Min } from "class-validator";

export class DepositInDto {
	@ApiProperty({ example: "bob" })
	@IsString()
	@IsNotEmpty()
	identity!: string;

	@ApiProperty({ minimum: 1, example: 5000 })
	@IsInt()
	@Min(1)
	amount!: number;
}

export class DepositOutDto {
	@ApiProperty({ example: "bob" })
	identity!: string;

	@ApiProperty({ description: "Balance after the deposit", example: 5000 })
	balance!: number;
}

import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, MaxLength, Min } from "class-validator";
import { MAX_DESCRIPTION_LENGTH } from "@bridgarr/sdk";

export class CreateAgreementInDto {
	@ApiProperty({ description: "Identity of the buyer", example: "bob" })
	@IsString()
	@IsNotEmpty()
	buyer!: string;

	@ApiProperty({
		minimum: 1,
		description: "Amount in the smallest unit",
		example: 1000,
	})
	@IsInt()
	@Min(1)
	amount!: number;

	@ApiProperty({
		maxLength: MAX_DESCRIPTION_LENGTH,
		example: "Logo design, three revisions",
	})
	@IsString()
	@MaxLength(MAX_DESCRIPTION_LENGTH)
	description!: string;
}

import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString } from "class-validator";

export class IssueTokenInDto {
	@ApiProperty({ example: "alice" })
	@IsString()
	@IsNotEmpty()
	identity!: string;
}

export class IssueTokenOutDto {
	@ApiProperty()
	accessToken!: string;

	@ApiProperty({ example: "alice" })
	identity!: string;

	@ApiProperty({ example: "2026-01-01T12:00:00.000Z" })
	expiresAt!: string;
}

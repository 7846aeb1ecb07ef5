import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";
import { AGREEMENT_STATUSES, type AgreementStatus } from "@bridgarr/sdk";

@Entity("agreements")
export class EscrowAgreement {
	// assigned by the escrow engine from the `next_id` counter
	@PrimaryColumn({ type: "integer" })
	id!: number;

	@Index()
	@Column({ type: "text" })
	vendor!: string;

	@Index()
	@Column({ type: "text" })
	buyer!: string;

	@Column({ type: "integer" })
	amount!: number;

	@Column({ type: "text" })
	description!: string;

	@Index()
	@Column({ type: "text", enum: AGREEMENT_STATUSES })
	status!: AgreementStatus;

	/** Engine clock value at creation, Unix epoch in milliseconds */
	@Column({ type: "integer" })
	createdAt!: number;

	@CreateDateColumn()
	insertedAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

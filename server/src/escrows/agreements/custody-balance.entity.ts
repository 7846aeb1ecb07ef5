import { Column, Entity, PrimaryColumn } from "typeorm";

/**
 * Present only while an agreement holds funds in custody.
 */
@Entity("escrow_balances")
export class CustodyBalance {
	@PrimaryColumn({ type: "integer" })
	agreementId!: number;

	@Column({ type: "integer" })
	balance!: number;
}

import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

@Entity("ledger_accounts")
export class LedgerAccount {
	@PrimaryColumn({ type: "text" })
	identity!: string;

	@Column({ type: "integer", default: 0 })
	balance!: number;

	@UpdateDateColumn()
	updatedAt!: Date;
}

import { Column, Entity, PrimaryColumn } from "typeorm";

export const NEXT_AGREEMENT_ID = "next_id";

@Entity("engine_counters")
export class EngineCounter {
	@PrimaryColumn({ type: "text" })
	name!: string;

	@Column({ type: "integer" })
	value!: number;
}

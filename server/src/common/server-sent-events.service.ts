import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import type { AgreementStatus } from "@bridgarr/sdk";
import {
	AGREEMENT_CREATED_ID,
	AGREEMENT_TRANSITIONED_ID,
	type AgreementCreated,
	type AgreementTransitioned,
} from "./agreement.event";

export type AgreementSse =
	| { type: "new_agreement"; agreementId: number }
	| { type: "agreement_updated"; agreementId: number; status: AgreementStatus };

export type SseEvent<T = AgreementSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<AgreementSse>();

	get adminEvents() {
		return this.events$.asObservable();
	}

	agreementEvents(id?: number) {
		if (id !== undefined) {
			return this.events$.pipe(filter((e) => e.agreementId === id));
		}
		return this.events$.asObservable();
	}

	@OnEvent(AGREEMENT_CREATED_ID)
	onAgreementCreated(evt: AgreementCreated) {
		this.events$.next({ type: "new_agreement", agreementId: evt.agreementId });
	}

	@OnEvent(AGREEMENT_TRANSITIONED_ID)
	onAgreementTransitioned(evt: AgreementTransitioned) {
		this.events$.next({
			type: "agreement_updated",
			agreementId: evt.agreementId,
			status: evt.status,
		});
	}
}

import type { AgreementAction, AgreementStatus } from "@bridgarr/sdk";

export const AGREEMENT_CREATED_ID = "agreement.created";
export type AgreementCreated = {
	eventId: string;
	agreementId: number;
	vendor: string;
	buyer: string;
	amount: number;
	createdAt: string;
};

export const AGREEMENT_TRANSITIONED_ID = "agreement.transitioned";
export type AgreementTransitioned = {
	eventId: string;
	agreementId: number;
	action: AgreementAction;
	status: AgreementStatus;
	by: string;
	transitionedAt: string;
};

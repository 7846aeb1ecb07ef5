import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import {
	adminAuth,
	createAgreementBody,
	createTestApp,
	deposit,
	issueToken,
	ledgerBalance,
} from "./utils";

describe("Agreement journey from dispute to refund", () => {
	let app: INestApplication;
	let vendorToken: string;
	let buyerToken: string;
	let arbiterToken: string;
	let agreementId: number;

	beforeAll(async () => {
		app = await createTestApp();
		vendorToken = await issueToken(app, "alice");
		buyerToken = await issueToken(app, "bob");
		arbiterToken = await issueToken(app, "arbiter");
		await deposit(app, "bob", 5000);

		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows/agreements")
			.set("Authorization", `Bearer ${vendorToken}`)
			.send(createAgreementBody)
			.expect(201);
		agreementId = res.body.data.id;

		for (const action of ["fund", "accept"]) {
			await request(app.getHttpServer())
				.patch(`/api/v1/escrows/agreements/${agreementId}/${action}`)
				.set("Authorization", `Bearer ${buyerToken}`)
				.expect(200);
		}
	});

	afterAll(async () => {
		await app.close();
	});

	it("should not let the arbiter refund before a dispute", async () => {
		const res = await request(app.getHttpServer())
			.patch(`/api/v1/escrows/arbitration/agreements/${agreementId}/refund`)
			.set("Authorization", `Bearer ${arbiterToken}`)
			.expect(422);

		expect(res.body.code).toBe("INVALID_STATUS");
		expect(res.body.errorNumber).toBe(102);
	});

	it("should open a dispute as the buyer and keep custody", async () => {
		const res = await request(app.getHttpServer())
			.patch(`/api/v1/escrows/agreements/${agreementId}/dispute`)
			.set("Authorization", `Bearer ${buyerToken}`)
			.expect(200);

		expect(res.body.data.status).toBe("disputed");
		expect(res.body.data.escrowBalance).toBe(1000);
		expect(res.body.data.allowedActions).toEqual([]);
	});

	it("should list the dispute for the arbiter only", async () => {
		await request(app.getHttpServer())
			.get("/api/v1/escrows/arbitration/disputes")
			.set("Authorization", `Bearer ${buyerToken}`)
			.expect(403);

		const res = await request(app.getHttpServer())
			.get("/api/v1/escrows/arbitration/disputes")
			.set("Authorization", `Bearer ${arbiterToken}`)
			.expect(200);

		expect(res.body.meta.total).toBe(1);
		expect(res.body.data[0]).toMatchObject({
			id: agreementId,
			status: "disputed",
			allowedActions: ["refund"],
		});
	});

	it("should refuse a refund from the buyer", async () => {
		const res = await request(app.getHttpServer())
			.patch(`/api/v1/escrows/arbitration/agreements/${agreementId}/refund`)
			.set("Authorization", `Bearer ${buyerToken}`)
			.expect(403);

		expect(res.body.code).toBe("NOT_AUTHORIZED");
		expect(res.body.details).toEqual({
			agreementId,
			action: "refund",
			requiredRole: "arbiter",
		});
	});

	it("should return custody to the buyer on refund", async () => {
		const res = await request(app.getHttpServer())
			.patch(`/api/v1/escrows/arbitration/agreements/${agreementId}/refund`)
			.set("Authorization", `Bearer ${arbiterToken}`)
			.expect(200);

		expect(res.body.data.status).toBe("refunded");
		expect(res.body.data.isFinal).toBe(true);
		expect(await ledgerBalance(app, buyerToken)).toBe(5000);
		expect(await ledgerBalance(app, vendorToken)).toBe(0);
	});

	it("should report the totals in the backoffice", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/admin/v1/stats")
			.set("Authorization", adminAuth)
			.expect(200);

		expect(res.body.data).toEqual({
			totalAgreements: 1,
			byStatus: {
				pending: 0,
				funded: 0,
				accepted: 0,
				completed: 0,
				disputed: 0,
				refunded: 1,
			},
			custodyBalance: 0,
		});
	});
});

import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import {
	createAgreementBody,
	createTestApp,
	deposit,
	issueToken,
	ledgerBalance,
} from "./utils";

describe("Agreement errors", () => {
	let app: INestApplication;
	let vendorToken: string;
	let buyerToken: string;

	const createAgreement = async (
		body: object = createAgreementBody,
	): Promise<number> => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows/agreements")
			.set("Authorization", `Bearer ${vendorToken}`)
			.send(body)
			.expect(201);
		return res.body.data.id;
	};

	beforeAll(async () => {
		app = await createTestApp();
		vendorToken = await issueToken(app, "alice");
		buyerToken = await issueToken(app, "bob");
		await deposit(app, "bob", 1500);
	});

	afterAll(async () => {
		await app.close();
	});

	describe("authentication", () => {
		it("should reject requests without a bearer token", async () => {
			await request(app.getHttpServer())
				.get("/api/v1/escrows/agreements")
				.expect(401);
		});

		it("should reject a forged token", async () => {
			await request(app.getHttpServer())
				.get("/api/v1/escrows/agreements")
				.set("Authorization", "Bearer not-a-jwt")
				.expect(401);
		});

		it("should protect the backoffice with basic auth", async () => {
			await request(app.getHttpServer())
				.post("/api/admin/v1/auth/tokens")
				.send({ identity: "mallory" })
				.expect(401);

			await request(app.getHttpServer())
				.post("/api/admin/v1/auth/tokens")
				.set(
					"Authorization",
					`Basic ${Buffer.from("admin:wrong").toString("base64")}`,
				)
				.send({ identity: "mallory" })
				.expect(401);
		});
	});

	describe("validation", () => {
		it.each([
			["a zero amount", { ...createAgreementBody, amount: 0 }],
			["a fractional amount", { ...createAgreementBody, amount: 10.5 }],
			["a missing buyer", { amount: 1000, description: "No buyer" }],
			[
				"a description over 256 characters",
				{ ...createAgreementBody, description: "x".repeat(257) },
			],
			["an unknown field", { ...createAgreementBody, arbiter: "alice" }],
		])("should reject %s", async (_label, body) => {
			await request(app.getHttpServer())
				.post("/api/v1/escrows/agreements")
				.set("Authorization", `Bearer ${vendorToken}`)
				.send(body)
				.expect(400);
		});

		it("should accept a description of exactly 256 characters", async () => {
			const id = await createAgreement({
				...createAgreementBody,
				description: "x".repeat(256),
			});
			expect(id).toBeGreaterThan(0);
		});

		it("should reject a non-numeric agreement id", async () => {
			await request(app.getHttpServer())
				.get("/api/v1/escrows/agreements/abc")
				.set("Authorization", `Bearer ${vendorToken}`)
				.expect(400);
		});

		it("should reject an invalid cursor", async () => {
			await request(app.getHttpServer())
				.get("/api/v1/escrows/agreements?cursor=garbage")
				.set("Authorization", `Bearer ${vendorToken}`)
				.expect(400);
		});
	});

	describe("transitions", () => {
		it("should 404 on an unknown agreement", async () => {
			const res = await request(app.getHttpServer())
				.patch("/api/v1/escrows/agreements/999/fund")
				.set("Authorization", `Bearer ${buyerToken}`)
				.expect(404);

			expect(res.body.code).toBe("NOT_FOUND");
			expect(res.body.errorNumber).toBe(104);
		});

		it("should refuse to let the vendor fund", async () => {
			const id = await createAgreement();

			const res = await request(app.getHttpServer())
				.patch(`/api/v1/escrows/agreements/${id}/fund`)
				.set("Authorization", `Bearer ${vendorToken}`)
				.expect(403);

			expect(res.body.code).toBe("NOT_AUTHORIZED");
			expect(res.body.errorNumber).toBe(100);
		});

		it("should refuse to fund twice", async () => {
			const id = await createAgreement();
			await request(app.getHttpServer())
				.patch(`/api/v1/escrows/agreements/${id}/fund`)
				.set("Authorization", `Bearer ${buyerToken}`)
				.expect(200);

			const res = await request(app.getHttpServer())
				.patch(`/api/v1/escrows/agreements/${id}/fund`)
				.set("Authorization", `Bearer ${buyerToken}`)
				.expect(422);

			expect(res.body.details).toEqual({
				agreementId: id,
				action: "fund",
				status: "funded",
				allowedActions: ["accept"],
			});
		});

		it("should refuse to fund beyond the buyer's balance", async () => {
			const before = await ledgerBalance(app, buyerToken);
			const id = await createAgreement({
				...createAgreementBody,
				amount: before + 1,
			});

			const res = await request(app.getHttpServer())
				.patch(`/api/v1/escrows/agreements/${id}/fund`)
				.set("Authorization", `Bearer ${buyerToken}`)
				.expect(402);

			expect(res.body.code).toBe("INSUFFICIENT_FUNDS");
			expect(res.body.errorNumber).toBe(103);
			expect(res.body.details).toMatchObject({
				account: "bob",
				requested: before + 1,
				available: before,
			});
			expect(await ledgerBalance(app, buyerToken)).toBe(before);

			const agreement = await request(app.getHttpServer())
				.get(`/api/v1/escrows/agreements/${id}`)
				.set("Authorization", `Bearer ${buyerToken}`)
				.expect(200);
			expect(agreement.body.data.status).toBe("pending");
		});
	});

	it("should report health without authentication", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);

		expect(res.body).toMatchObject({
			status: "ok",
			database: "up",
			arbiter: "arbiter",
		});
	});
});

import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";

export const adminAuth = `Basic ${Buffer.from("admin:test-pass").toString("base64")}`;

export const createAgreementBody = {
	buyer: "bob",
	amount: 1000,
	description: "Logo design, three revisions",
};

export async function createTestApp(): Promise<INestApplication> {
	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = configureApp(moduleFixture.createNestApplication());
	await app.init();
	return app;
}

export async function issueToken(
	app: INestApplication,
	identity: string,
): Promise<string> {
	const res = await request(app.getHttpServer())
		.post("/api/admin/v1/auth/tokens")
		.set("Authorization", adminAuth)
		.send({ identity })
		.expect(200);
	return res.body.data.accessToken;
}

export async function deposit(
	app: INestApplication,
	identity: string,
	amount: number,
): Promise<number> {
	const res = await request(app.getHttpServer())
		.post("/api/admin/v1/ledger/deposits")
		.set("Authorization", adminAuth)
		.send({ identity, amount })
		.expect(200);
	return res.body.data.balance;
}

export async function ledgerBalance(
	app: INestApplication,
	token: string,
): Promise<number> {
	const res = await request(app.getHttpServer())
		.get("/api/v1/ledger/balance")
		.set("Authorization", `Bearer ${token}`)
		.expect(200);
	return res.body.data.balance;
}

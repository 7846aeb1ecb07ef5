import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { errorMessage } from "./common/errors";

dotenv.config();

async function bootstrap() {
	const app = configureApp(await NestFactory.create(AppModule));
	app.enableShutdownHooks();

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
	Logger.error(`Failed to start: ${errorMessage(err)}`, "Bootstrap");
	process.exit(1);
});

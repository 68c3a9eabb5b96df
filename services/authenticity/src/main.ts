import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import morgan from "morgan";

import { AppModule } from "./app.module.js";
import { configureApp } from "./app.setup.js";
import { APP_CONFIG } from "./tokens.js";
import type { AppConfig } from "./config.js";

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  app.use(morgan("tiny"));

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  new Logger("Bootstrap").log(
    `Authenticity service on port ${config.port} (exiftool: ${config.exiftool.path}, upload limit: ${config.upload.maxBytes} bytes)`,
  );
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to start authenticity service", error);
    process.exitCode = 1;
  });
}

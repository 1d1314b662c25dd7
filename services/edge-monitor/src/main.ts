import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module.js";
import { APP_CONFIG } from "./tokens.js";
import type { MonitorConfig } from "./config.js";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks(["SIGINT", "SIGTERM"]);

  const config = app.get<MonitorConfig>(APP_CONFIG);
  await app.listen(config.server.port);
  new Logger("Bootstrap").log(`Status API listening on port ${config.server.port}`);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to bootstrap edge monitor", error);
    process.exitCode = 1;
  });
}

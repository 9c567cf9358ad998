import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import { pinoHttp } from "pino-http";

import { AppModule } from "./modules/app.module";
import { ZodExceptionFilter } from "./modules/common/zod-exception.filter";
import { ConfigService } from "./modules/config/config.service";
import { createLogger } from "./modules/logging/pino-logger";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false
  });

  const settings = app.get(ConfigService).load();
  const logger = createLogger(settings);

  app.use(json({ limit: "2mb" }));
  app.use(pinoHttp({ logger }));

  app.useLogger({
    log: (message) => logger.info({ msg: message }),
    error: (message, trace) => logger.error({ msg: message, trace }),
    warn: (message) => logger.warn({ msg: message }),
    debug: (message) => logger.debug({ msg: message }),
    verbose: (message) => logger.trace({ msg: message })
  });

  app.useGlobalFilters(new ZodExceptionFilter());
  app.enableShutdownHooks();

  await app.listen(settings.port, settings.apiHost);

  logger.info({ msg: "API listening", port: settings.port, host: settings.apiHost, dataDir: settings.dataDir });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});

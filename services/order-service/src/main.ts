import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import * as Sentry from "@sentry/node";
import { AppModule } from "./app.module";
import { configureApp } from "./bootstrap";
import { getOrderServiceEnv, OrderServiceEnv } from "./config/env";

function initSentry(env: OrderServiceEnv): void {
  if (!env.sentryDsn) return;
  Sentry.init({
    dsn: env.sentryDsn,
    environment: env.appEnv,
    tracesSampleRate: 0.2,
    release: process.env.RELEASE_SHA || "local",
    serverName: "order-service",
  });
}

async function bootstrap(): Promise<void> {
  const env = getOrderServiceEnv();
  initSentry(env);
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: true }),
  );

  configureApp(app, env);
  app.enableShutdownHooks();
  await app.listen(env.port, "0.0.0.0");
}

bootstrap().catch((error: unknown) => {
  new Logger("bootstrap").error(`order-service failed to start: ${String(error)}`);
  process.exit(1);
});

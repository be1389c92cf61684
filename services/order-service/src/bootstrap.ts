import { INestApplication } from "@nestjs/common";
import { AppExceptionFilter } from "./common/app-exception.filter";
import { createValidationPipe } from "./common/validation";
import { OrderServiceEnv } from "./config/env";

/** Shared by `main.ts` and the HTTP tests so both run the same pipeline. */
export function configureApp(app: INestApplication, env: OrderServiceEnv): void {
  app.enableCors({ origin: true, credentials: true });
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AppExceptionFilter({
    exposeErrorDetails: env.exposeErrorDetails,
    reportToSentry: Boolean(env.sentryDsn),
  }));
}

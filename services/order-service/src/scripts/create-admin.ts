import "reflect-metadata";
import { createDocumentStore } from "@orderdesk/database";
import { Logger } from "@nestjs/common";
import { getOrderServiceEnv } from "../config/env";
import { AdminAuthService } from "../modules/auth/admin-auth.service";
import { AdminRepository } from "../modules/auth/repository/admin.repository";

const logger = new Logger("create-admin");

async function main(): Promise<void> {
  const [email, password, ...nameParts] = process.argv.slice(2);
  if (!email || !password) {
    logger.error("usage: npm run admin:create -- <email> <password> [name]");
    process.exitCode = 1;
    return;
  }

  const env = getOrderServiceEnv();
  if (!env.databaseUrl) {
    logger.warn("No database configured; the admin will only exist for the lifetime of this process");
  }
  const store = createDocumentStore({ connectionString: env.databaseUrl, log: (message) => logger.log(message) });
  try {
    const admin = await new AdminAuthService(new AdminRepository(store)).createAdmin(email, password, nameParts.join(" "));
    logger.log(`Created admin ${admin.email} with id ${admin.id}`);
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  logger.error(`create-admin failed: ${String(error)}`);
  process.exitCode = 1;
});

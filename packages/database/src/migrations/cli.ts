import { PostgresDocumentStore } from "../postgres-document-store";

async function main(): Promise<void> {
  const command = process.argv[2] || "status";
  const connectionString = process.env.ORDER_DATABASE_URL || process.env.DATABASE_URL;

  if (!connectionString) {
    console.error("[db-migrate] Database unavailable; set DATABASE_URL (or ORDER_DATABASE_URL).");
    process.exit(1);
  }

  const store = new PostgresDocumentStore({
    connectionString,
    autoMigrate: false,
    log: (message) => console.log(`[db-migrate] ${message}`),
  });

  try {
    if (command === "up") {
      const ran = await store.migrateUp();
      console.log(ran.length === 0 ? "[db-migrate] No pending migrations." : `[db-migrate] Applied: ${ran.join(", ")}`);
      return;
    }

    if (command === "down") {
      const rolledBack = await store.rollbackLastMigration();
      console.log(rolledBack ? `[db-migrate] Rolled back: ${rolledBack}` : "[db-migrate] No applied migrations to roll back.");
      return;
    }

    const status = await store.migrationStatus();
    for (const item of status) {
      console.log(`${item.applied ? "[x]" : "[ ]"} ${item.id}`);
    }
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  console.error(`[db-migrate] ${String(error)}`);
  process.exit(1);
});

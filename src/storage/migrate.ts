/**
 * Standalone migration script.
 * Run with: npm run db:migrate
 */

import { config } from "../config.ts";
import { closeDatabase, initDatabase } from "./database.ts";

async function main() {
  console.log("Running database migrations...");
  console.log(`Data directory: ${config.dataDir}`);

  await initDatabase(config.dataDir);
  closeDatabase();

  console.log("Migrations complete.");
}

main().catch((err: unknown) => {
  console.error("Migration failed:", err);
  process.exit(1);
});

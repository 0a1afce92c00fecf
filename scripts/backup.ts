import { existsSync, mkdirSync } from "node:fs";
import { join, resolve } from "node:path";
import Database from "better-sqlite3";
import { config } from "../src/config.ts";

const backupRoot = process.argv[2] || "./backups";
const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
const backupDir = resolve(process.cwd(), backupRoot, `backup-${timestamp}`);
const dataDir = resolve(process.cwd(), config.dataDir);

const dbPath = join(dataDir, "stockline.db");
const dbBackupPath = join(backupDir, "stockline.db");

async function main() {
  console.log(`📂 Data directory: ${dataDir}`);

  if (!existsSync(dbPath)) {
    console.warn("⚠️ Database file not found, nothing to back up.");
    return;
  }

  console.log(`📦 Creating backup at: ${backupDir}`);
  mkdirSync(backupDir, { recursive: true });

  // Online backup: consistent even while the server keeps writing
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    await db.backup(dbBackupPath);
  } finally {
    db.close();
  }

  console.log("✅ Database backed up successfully.");
}

main().catch((err: unknown) => {
  console.error("❌ Failed to backup database:", err);
  process.exit(1);
});

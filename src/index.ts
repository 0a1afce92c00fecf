import { printHelp, runAdminCli } from "./cli-handlers.ts";
import { config } from "./config.ts";
import { createServer } from "./server.ts";
import { closeDatabase, initDatabase } from "./storage/database.ts";

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  // Initialize database (needed for both server and CLI)
  await initDatabase(config.dataDir);

  // Known CLI categories: user, session, operations, help, --help, -h
  const cliCommands = ["user", "session", "operations", "help", "--help", "-h"];

  if (!command || command === "server") {
    await runServer();
  } else if (cliCommands.includes(command)) {
    await runAdminCli(args);
    closeDatabase();
  } else {
    console.error(`Unknown command: ${command}`);
    printHelp();
    closeDatabase();
    process.exitCode = 1;
  }
}

async function runServer() {
  const server = await createServer(config);

  if (!config.session.secret) {
    server.log.warn("SESSION_SECRET is not set; sessions will not survive a restart");
  }

  // Handle graceful shutdown
  const shutdown = async () => {
    server.log.info("Shutting down...");
    await server.close();
    closeDatabase();
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      server.log.error(err);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.log.error(err);
    closeDatabase();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});

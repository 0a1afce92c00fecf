import { createSessionToken } from "./auth/tokens.ts";
import { config } from "./config.ts";
import { createUser, getAllUsers, getUser, listOperations } from "./storage/database.ts";

export async function runAdminCli(args: string[]) {
  const [category, action, ...params] = args;

  if (!category || category === "help" || category === "--help" || category === "-h") {
    printHelp();
    return;
  }

  if (!action) {
    printHelp();
    process.exitCode = 1;
    return;
  }

  try {
    switch (category) {
      case "user":
        handleUser(action, params);
        break;
      case "session":
        handleSession(action, params);
        break;
      case "operations":
        handleOperations(action, params);
        break;
      default:
        console.error(`Unknown category: ${category}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

export function printHelp() {
  console.log(`
Stockline Server & Admin CLI

Usage:
  stockline [server]          Start the server (default)
  stockline <category> <cmd>  Run admin command

Categories:
  user, session, operations

Commands:
  user list [limit] [offset]
  user get <id>
  user create <id> [name]

  session create <userId>     Print a session cookie for the user

  operations list [limit] [offset]
`);
}

function parseLimit(value: string | undefined, fallback: number): number {
  const parsed = Number(value ?? fallback);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid number: ${value}`);
  }
  return parsed;
}

function handleUser(action: string, params: string[]) {
  switch (action) {
    case "list": {
      const users = getAllUsers(parseLimit(params[0], 100), parseLimit(params[1], 0));
      console.table(users);
      break;
    }
    case "get": {
      const id = params[0];
      if (!id) throw new Error("Missing user ID");
      const user = getUser(id);
      if (!user) console.error("User not found");
      else console.table([user]);
      break;
    }
    case "create": {
      const [id, ...nameParts] = params;
      if (!id) throw new Error("Missing user ID");
      const user = createUser({ id, name: nameParts.length > 0 ? nameParts.join(" ") : null });
      console.log("User created:");
      console.table([user]);
      break;
    }
    default:
      console.error(`Unknown user action: ${action}`);
      printHelp();
      process.exitCode = 1;
  }
}

function handleSession(action: string, params: string[]) {
  switch (action) {
    case "create": {
      const userId = params[0];
      if (!userId) throw new Error("Missing user ID");
      if (!getUser(userId)) throw new Error(`User ${userId} not found`);
      if (!config.session.secret) {
        console.warn("SESSION_SECRET is not set; this token dies with this process.");
      }
      const token = createSessionToken(userId);
      console.log(`${config.session.cookieName}=${token}`);
      break;
    }
    default:
      console.error(`Unknown session action: ${action}`);
      printHelp();
      process.exitCode = 1;
  }
}

function handleOperations(action: string, params: string[]) {
  switch (action) {
    case "list": {
      const operations = listOperations(parseLimit(params[0], 100), parseLimit(params[1], 0));
      console.table(
        operations.map((operation) => ({
          id: operation.id,
          localId: operation.localId,
          kind: operation.kind,
          userId: operation.userId,
          receivedAt: operation.receivedAt.toISOString(),
        })),
      );
      break;
    }
    default:
      console.error(`Unknown operations action: ${action}`);
      printHelp();
      process.exitCode = 1;
  }
}

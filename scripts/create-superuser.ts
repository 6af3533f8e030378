/**
 * Create an admin account.
 *
 *   npm run create-superuser -- --username admin --email admin@example.com --password <pw>
 */
import { connectMongo, closeMongo } from "../src/config/db.js";
import { env } from "../src/config/env.js";
import { logger } from "../src/config/logger.js";
import { mongoStores } from "../src/context.js";
import { UsersService } from "../src/modules/users/service.js";

function arg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx >= 0 && process.argv[idx + 1]) return process.argv[idx + 1];
  return undefined;
}

async function main() {
  const username = arg("username");
  const email = arg("email");
  const password = arg("password") ?? process.env.SUPERUSER_PASSWORD;
  if (!username || !email || !password) {
    throw new Error("Usage: create-superuser --username <u> --email <e> --password <p>");
  }

  await connectMongo();
  const users = new UsersService(mongoStores(), {
    bcryptRounds: env.BCRYPT_ROUNDS,
    contactKeyMaxAttempts: env.CONTACT_KEY_MAX_ATTEMPTS,
  });
  const user = await users.createSuperuser({ username, email, password });
  logger.info("superuser created", { id: user.id, username: user.username, contactKey: user.contactKey });
  await closeMongo();
}

main().catch(async (err: unknown) => {
  logger.error("create-superuser failed", {
    message: err instanceof Error ? err.message : String(err),
  });
  await closeMongo();
  process.exit(1);
});

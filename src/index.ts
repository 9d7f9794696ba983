import { config } from "./config";
import * as Sentry from "@sentry/node";

// Initialize Sentry before other imports
if (config.sentryDsn) {
  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
  });
}

import { createApp } from "./app";
import { client, runMigrations } from "./db";
import { seedDefaults } from "./db/seed";
import { sessionService } from "./services";

async function main() {
  console.log("Starting EcoSpark...");
  console.log(`Environment: ${config.nodeEnv}`);

  // Run database migrations
  try {
    await runMigrations();
  } catch (error) {
    console.error("Error running migrations:", error);
    process.exit(1);
  }

  // Seed default data
  try {
    await seedDefaults();
  } catch (error) {
    console.error("Error seeding database:", error);
  }

  const purged = await sessionService.purgeExpired();
  if (purged > 0) {
    console.log(`Removed ${purged} expired sessions`);
  }

  const app = createApp();

  // Graceful shutdown
  const shutdown = async () => {
    console.log("Shutting down...");
    await app.close();
    client.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const address = await app.listen({ port: config.port, host: config.host });
  console.log(`EcoSpark is listening on ${address}`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});

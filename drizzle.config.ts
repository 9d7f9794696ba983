import type { Config } from "drizzle-kit";

export default {
  schema: "./src/db/schema/index.ts",
  dialect: "turso",
  dbCredentials: {
    url: process.env.DATABASE_URL || "file:./data/ecospark.db",
  },
} satisfies Config;

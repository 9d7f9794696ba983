import { sqliteTable, integer, uniqueIndex } from "drizzle-orm/sqlite-core";
import { users } from "./users";
import { challenges } from "./challenges";

export const challengeCompletions = sqliteTable(
  "challenge_completions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    challengeId: integer("challenge_id")
      .notNull()
      .references(() => challenges.id, { onDelete: "cascade" }),

    completedAt: integer("completed_at", { mode: "timestamp" }).notNull().$defaultFn(() => new Date()),
  },
  (table) => ({
    // At most one completion per (user, challenge); inserts rely on it
    userChallengeUnique: uniqueIndex("challenge_completions_user_challenge_unique").on(
      table.userId,
      table.challengeId
    ),
  })
);

export type ChallengeCompletion = typeof challengeCompletions.$inferSelect;
export type NewChallengeCompletion = typeof challengeCompletions.$inferInsert;

import { sqliteTable, integer } from "drizzle-orm/sqlite-core";
import { users } from "./users";

export const userCredits = sqliteTable("user_credits", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id")
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: "cascade" }),
  points: integer("points").notNull().default(0),
});

export type UserCredit = typeof userCredits.$inferSelect;

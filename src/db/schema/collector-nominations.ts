import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

export const collectorNominations = sqliteTable("collector_nominations", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  city: text("city").notNull(),
  phone: text("phone"),

  createdAt: integer("created_at", { mode: "timestamp" }).notNull().$defaultFn(() => new Date()),
});

export type CollectorNomination = typeof collectorNominations.$inferSelect;
export type NewCollectorNomination = typeof collectorNominations.$inferInsert;

import { sqliteTable, text, integer, real } from "drizzle-orm/sqlite-core";

export const recyclingCenters = sqliteTable("recycling_centers", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  address: text("address").notNull(),
  latitude: real("latitude").notNull(),
  longitude: real("longitude").notNull(),
});

export type RecyclingCenter = typeof recyclingCenters.$inferSelect;
export type NewRecyclingCenter = typeof recyclingCenters.$inferInsert;

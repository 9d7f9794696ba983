import { sqliteTable, text, integer, real } from "drizzle-orm/sqlite-core";

export const devices = sqliteTable("devices", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  modelName: text("model_name").notNull(),
  metalValue: real("metal_value").notNull(), // grams of recoverable metal
});

export type Device = typeof devices.$inferSelect;
export type NewDevice = typeof devices.$inferInsert;

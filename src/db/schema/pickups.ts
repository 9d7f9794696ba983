import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

export const driveTypeEnum = ["single_pickup", "community_drive"] as const;
export type DriveType = (typeof driveTypeEnum)[number];

export const pickups = sqliteTable("pickups", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  email: text("email").notNull(),
  phone: text("phone").notNull(),
  address: text("address").notNull(),
  wasteType: text("waste_type").notNull(),
  driveType: text("drive_type", { enum: driveTypeEnum }).notNull(),
  pickupDate: text("pickup_date").notNull(), // YYYY-MM-DD
  pickupTime: text("pickup_time").notNull(), // HH:MM

  createdAt: integer("created_at", { mode: "timestamp" }).notNull().$defaultFn(() => new Date()),
});

export type Pickup = typeof pickups.$inferSelect;
export type NewPickup = typeof pickups.$inferInsert;

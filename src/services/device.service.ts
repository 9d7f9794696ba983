import { sql } from "drizzle-orm";
import { db, schema } from "../db";
import type { NewDevice } from "../db/schema";

export const deviceService = {
  async create(data: NewDevice) {
    const [device] = await db.insert(schema.devices).values(data).returning();
    return device;
  },

  async findByModelName(modelName: string) {
    const [device] = await db
      .select()
      .from(schema.devices)
      .where(sql`lower(${schema.devices.modelName}) = lower(${modelName.trim()})`)
      .limit(1);
    return device;
  },
};

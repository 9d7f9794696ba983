import { z } from "zod";
import { db, schema } from "../db";
import { driveTypeEnum } from "../db/schema";

export const pickupInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  email: z.string().trim().email(),
  phone: z.string().trim().min(7).max(20),
  address: z.string().trim().min(1),
  wasteType: z.string().trim().min(1).max(50),
  driveType: z.enum(driveTypeEnum),
  pickupDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),
  pickupTime: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM"),
});

export type PickupInput = z.infer<typeof pickupInputSchema>;

export const pickupService = {
  async create(input: PickupInput) {
    const [pickup] = await db.insert(schema.pickups).values(input).returning();
    console.log(`Pickup #${pickup.id} booked: ${pickup.driveType} on ${pickup.pickupDate} ${pickup.pickupTime}`);
    return pickup;
  },
};

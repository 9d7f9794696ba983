import { eq, sql } from "drizzle-orm";
import { db, schema } from "../db";
import type { Device } from "../db/schema";
import { config } from "../config";
import { deviceService } from "./device.service";

export interface RedeemResult {
  device: Device;
  pointsAwarded: number;
  // false for anonymous visitors: points are shown but not kept
  saved: boolean;
  balance: number | null;
}

export function pointsFor(metalValue: number): number {
  return Math.round(metalValue * config.pointsPerGramOfMetal);
}

export const creditService = {
  async getOrCreate(userId: number) {
    await db.insert(schema.userCredits).values({ userId, points: 0 }).onConflictDoNothing();
    const [credit] = await db
      .select()
      .from(schema.userCredits)
      .where(eq(schema.userCredits.userId, userId));
    return credit;
  },

  async getBalance(userId: number) {
    const credit = await this.getOrCreate(userId);
    return credit.points;
  },

  async award(userId: number, points: number) {
    await this.getOrCreate(userId);
    const [updated] = await db
      .update(schema.userCredits)
      .set({ points: sql`${schema.userCredits.points} + ${points}` })
      .where(eq(schema.userCredits.userId, userId))
      .returning();
    return updated.points;
  },

  /** Returns null when the device model is unknown. */
  async redeemDevice(userId: number | null, modelName: string): Promise<RedeemResult | null> {
    const device = await deviceService.findByModelName(modelName);
    if (!device) return null;

    const pointsAwarded = pointsFor(device.metalValue);
    if (userId === null) {
      return { device, pointsAwarded, saved: false, balance: null };
    }

    const balance = await this.award(userId, pointsAwarded);
    console.log(`Awarded ${pointsAwarded} points to user:${userId} for ${device.modelName}`);
    return { device, pointsAwarded, saved: true, balance };
  },
};

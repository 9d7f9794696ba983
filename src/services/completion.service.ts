import { and, desc, eq } from "drizzle-orm";
import { db, schema } from "../db";

/**
 * Durable storage of challenge completions. `createIfAbsent` is the only way
 * completion rows are written.
 */
export interface CompletionStore {
  challengeExists(challengeId: number): Promise<boolean>;
  /** Resolves true when a row was created, false when one already existed. */
  createIfAbsent(userId: number, challengeId: number): Promise<boolean>;
  exists(userId: number, challengeId: number): Promise<boolean>;
  listChallengeIds(userId: number): Promise<number[]>;
}

export const completionService = {
  async challengeExists(challengeId: number) {
    const [challenge] = await db
      .select({ id: schema.challenges.id })
      .from(schema.challenges)
      .where(eq(schema.challenges.id, challengeId));
    return challenge !== undefined;
  },

  async createIfAbsent(userId: number, challengeId: number) {
    // The unique index on (user_id, challenge_id) decides the race, not a prior read
    const inserted = await db
      .insert(schema.challengeCompletions)
      .values({ userId, challengeId })
      .onConflictDoNothing({
        target: [schema.challengeCompletions.userId, schema.challengeCompletions.challengeId],
      })
      .returning({ id: schema.challengeCompletions.id });
    return inserted.length > 0;
  },

  async exists(userId: number, challengeId: number) {
    const [completion] = await db
      .select({ id: schema.challengeCompletions.id })
      .from(schema.challengeCompletions)
      .where(
        and(
          eq(schema.challengeCompletions.userId, userId),
          eq(schema.challengeCompletions.challengeId, challengeId)
        )
      );
    return completion !== undefined;
  },

  async listChallengeIds(userId: number) {
    const rows = await db
      .select({ challengeId: schema.challengeCompletions.challengeId })
      .from(schema.challengeCompletions)
      .where(eq(schema.challengeCompletions.userId, userId))
      .orderBy(desc(schema.challengeCompletions.completedAt), desc(schema.challengeCompletions.id));
    return rows.map((row) => row.challengeId);
  },

  async findByUser(userId: number) {
    return db
      .select()
      .from(schema.challengeCompletions)
      .where(eq(schema.challengeCompletions.userId, userId))
      .orderBy(desc(schema.challengeCompletions.completedAt), desc(schema.challengeCompletions.id));
  },
};

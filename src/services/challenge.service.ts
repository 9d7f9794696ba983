import { and, asc, desc, eq } from "drizzle-orm";
import { db, schema } from "../db";
import type { Challenge, NewChallenge } from "../db/schema";
import { completionService } from "./completion.service";
import type { CompletionSubject } from "./reconcile.service";
import { formatCompletionKey } from "../utils/completion-keys";
import { roundTo } from "../utils/math";

export interface Badge {
  icon: string;
  name: string;
}

// Highest threshold first
const badgeLevels: Array<Badge & { minCompleted: number }> = [
  { minCompleted: 5, icon: "🌳", name: "Eco Hero" },
  { minCompleted: 3, icon: "🌿", name: "Green Influencer" },
  { minCompleted: 1, icon: "🌱", name: "Eco Starter" },
];

export interface ChallengeSummary {
  totalCo2: number;
  completedCount: number;
  progress: number;
  badge: Badge | null;
}

export type CompleteResult =
  | { found: false }
  | { found: true; challenge: Challenge; created: boolean; keys: string[] | null };

export function badgeFor(completedCount: number): Badge | null {
  const level = badgeLevels.find((entry) => completedCount >= entry.minCompleted);
  return level ? { icon: level.icon, name: level.name } : null;
}

export const challengeService = {
  async create(data: NewChallenge) {
    const [challenge] = await db.insert(schema.challenges).values(data).returning();
    return challenge;
  },

  async findActiveById(id: number) {
    const [challenge] = await db
      .select()
      .from(schema.challenges)
      .where(and(eq(schema.challenges.id, id), eq(schema.challenges.isActive, true)));
    return challenge;
  },

  async listActive() {
    return db
      .select()
      .from(schema.challenges)
      .where(eq(schema.challenges.isActive, true))
      .orderBy(asc(schema.challenges.order), desc(schema.challenges.createdAt), desc(schema.challenges.id));
  },

  async update(id: number, data: Partial<Pick<Challenge, "title" | "co2Saved" | "isActive" | "order">>) {
    const [updated] = await db
      .update(schema.challenges)
      .set(data)
      .where(eq(schema.challenges.id, id))
      .returning();
    return updated;
  },

  /**
   * Marks an active challenge as done. Signed-in users get a durable row;
   * anonymous visitors get back their key list with the challenge added.
   */
  async complete(subject: CompletionSubject, challengeId: number): Promise<CompleteResult> {
    const challenge = await this.findActiveById(challengeId);
    if (!challenge) return { found: false };

    if (subject.kind === "user") {
      const created = await completionService.createIfAbsent(subject.userId, challengeId);
      return { found: true, challenge, created, keys: null };
    }

    const key = formatCompletionKey(challengeId);
    if (subject.keys.includes(key)) {
      return { found: true, challenge, created: false, keys: [...subject.keys] };
    }
    return { found: true, challenge, created: true, keys: [...subject.keys, key] };
  },

  summarize(activeChallenges: Challenge[], completedIds: readonly number[]): ChallengeSummary {
    const completed = activeChallenges.filter((challenge) => completedIds.includes(challenge.id));
    const totalCo2 = completed.reduce((sum, challenge) => sum + challenge.co2Saved, 0);
    const progress =
      activeChallenges.length > 0 ? Math.floor((completed.length / activeChallenges.length) * 100) : 0;

    return {
      totalCo2: roundTo(totalCo2, 1),
      completedCount: completed.length,
      progress,
      badge: badgeFor(completed.length),
    };
  },
};

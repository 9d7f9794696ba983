import { createHash, randomBytes } from "node:crypto";
import { and, eq, gt, lte } from "drizzle-orm";
import { db, schema } from "../db";
import { config } from "../config";
import type { VisitorSession } from "../types/context";
import { parseSessionData, type SessionData } from "../types/session";

const DAY_MS = 24 * 60 * 60 * 1000;

export function hashSessionToken(rawToken: string): string {
  return createHash("sha256").update(rawToken + config.sessionSecret, "utf8").digest("hex");
}

function generateRawToken(): string {
  return randomBytes(32).toString("base64url");
}

function expiryFromNow(): Date {
  return new Date(Date.now() + config.sessionTtlDays * DAY_MS);
}

export interface IssuedSession {
  token: string;
  session: VisitorSession;
}

export const sessionService = {
  /** Resolves an unexpired session from its raw cookie token. */
  async load(rawToken: string): Promise<VisitorSession | undefined> {
    const [row] = await db
      .select()
      .from(schema.sessions)
      .where(and(eq(schema.sessions.id, hashSessionToken(rawToken)), gt(schema.sessions.expiresAt, new Date())));
    if (!row) return undefined;

    return { id: row.id, userId: row.userId, data: parseSessionData(row.data) };
  },

  async create(userId: number | null, data: SessionData): Promise<IssuedSession> {
    const token = generateRawToken();
    const id = hashSessionToken(token);
    await db.insert(schema.sessions).values({
      id,
      userId,
      data: JSON.stringify(data),
      expiresAt: expiryFromNow(),
    });
    return { token, session: { id, userId, data } };
  },

  async save(sessionId: string, data: SessionData) {
    await db
      .update(schema.sessions)
      .set({ data: JSON.stringify(data) })
      .where(eq(schema.sessions.id, sessionId));
  },

  /** Replaces a session with a fresh token, e.g. when a visitor logs in. */
  async rotate(previousId: string | null, userId: number | null, data: SessionData): Promise<IssuedSession> {
    if (previousId) {
      await this.destroy(previousId);
    }
    return this.create(userId, data);
  },

  async destroy(sessionId: string) {
    await db.delete(schema.sessions).where(eq(schema.sessions.id, sessionId));
  },

  async purgeExpired(now: Date = new Date()) {
    const removed = await db
      .delete(schema.sessions)
      .where(lte(schema.sessions.expiresAt, now))
      .returning({ id: schema.sessions.id });
    return removed.length;
  },
};

import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import * as Sentry from "@sentry/node";
import { and, eq, ne, or } from "drizzle-orm";
import { db, schema } from "../db";
import type { User } from "../db/schema";
import type { VisitorSession } from "../types/context";
import { sessionService, type IssuedSession } from "./session.service";
import { reconcileService } from "./reconcile.service";

function deriveKey(password: string, salt: string, keyLength: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, (error, derivedKey) => {
      if (error) reject(error);
      else resolve(derivedKey);
    });
  });
}

const KEY_LENGTH = 64;

export type AuthResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export interface RegisterInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string;
}

export interface ProfileUpdate {
  username: string;
  firstName: string;
  lastName: string;
}

export interface LoginOutcome extends IssuedSession {
  user: User;
  mergedCount: number;
  message: string | null;
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16).toString("hex");
  const derived = await deriveKey(password, salt, KEY_LENGTH);
  return `scrypt$${salt}$${derived.toString("hex")}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, salt, hash] = stored.split("$");
  if (scheme !== "scrypt" || !salt || !hash) return false;

  const expected = Buffer.from(hash, "hex");
  const derived = await deriveKey(password, salt, expected.length);
  return derived.length === expected.length && timingSafeEqual(derived, expected);
}

export function toPublicUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
  };
}

export function mergedMessage(count: number): string | null {
  if (count === 0) return null;
  return `We saved ${count} challenge${count === 1 ? "" : "s"} from your previous session.`;
}

export const authService = {
  async findById(id: number) {
    const [user] = await db.select().from(schema.users).where(eq(schema.users.id, id));
    return user;
  },

  async findByUsername(username: string) {
    const [user] = await db.select().from(schema.users).where(eq(schema.users.username, username));
    return user;
  },

  async register(input: RegisterInput): Promise<AuthResult<User>> {
    const taken = await db
      .select({ username: schema.users.username, email: schema.users.email })
      .from(schema.users)
      .where(or(eq(schema.users.username, input.username), eq(schema.users.email, input.email)));

    const errors: string[] = [];
    if (taken.some((row) => row.username === input.username)) {
      errors.push("This username is already taken. Please choose another.");
    }
    if (taken.some((row) => row.email === input.email)) {
      errors.push("An account with this email already exists.");
    }
    if (errors.length > 0) return { ok: false, errors };

    const [user] = await db
      .insert(schema.users)
      .values({
        username: input.username,
        email: input.email,
        firstName: input.firstName,
        lastName: input.lastName,
        passwordHash: await hashPassword(input.password),
      })
      .returning();
    console.log(`Registered user:${user.id} (${user.username})`);
    return { ok: true, value: user };
  },

  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.findByUsername(username);
    if (!user) return null;
    return (await verifyPassword(password, user.passwordHash)) ? user : null;
  },

  /**
   * Binds a fresh session to the user and merges completions the visitor made
   * while anonymous. A failed merge is logged and never fails the login.
   */
  async login(user: User, previous: VisitorSession): Promise<LoginOutcome> {
    // Keys left in another account's session belong to that account's visitor, not this one
    const carriesKeys = previous.userId === null || previous.userId === user.id;
    const anonymousKeys = carriesKeys ? (previous.data.challengesCompleted ?? []) : [];
    if (!carriesKeys && (previous.data.challengesCompleted?.length ?? 0) > 0) {
      console.warn(`Dropping pending completions of user:${previous.userId} on login of user:${user.id}`);
    }
    // Keys ride along into the new session until the merge has stored them
    const issued = await sessionService.rotate(
      previous.id,
      user.id,
      anonymousKeys.length > 0 ? { challengesCompleted: [...anonymousKeys] } : {}
    );

    let mergedCount = 0;
    if (anonymousKeys.length > 0 && issued.session.id) {
      try {
        const result = await reconcileService.reconcile(user.id, anonymousKeys);
        mergedCount = result.mergedCount;

        const data = result.remainingKeys.length > 0 ? { challengesCompleted: result.remainingKeys } : {};
        await sessionService.save(issued.session.id, data);
        issued.session.data = data;
      } catch (error) {
        console.error(`Failed to merge anonymous completions for user:${user.id}:`, error);
        Sentry.captureException(error);
      }
    }

    return { ...issued, user, mergedCount, message: mergedMessage(mergedCount) };
  },

  async updateProfile(userId: number, update: ProfileUpdate): Promise<AuthResult<User>> {
    const [clash] = await db
      .select({ id: schema.users.id })
      .from(schema.users)
      .where(and(eq(schema.users.username, update.username), ne(schema.users.id, userId)));
    if (clash) {
      return { ok: false, errors: ["This username is already taken. Please choose another."] };
    }

    const [updated] = await db
      .update(schema.users)
      .set({ username: update.username, firstName: update.firstName, lastName: update.lastName })
      .where(eq(schema.users.id, userId))
      .returning();
    if (!updated) return { ok: false, errors: ["User not found."] };
    return { ok: true, value: updated };
  },

  async changePassword(userId: number, oldPassword: string, newPassword: string): Promise<AuthResult<User>> {
    const user = await this.findById(userId);
    if (!user) return { ok: false, errors: ["User not found."] };
    if (!(await verifyPassword(oldPassword, user.passwordHash))) {
      return { ok: false, errors: ["Your old password was entered incorrectly."] };
    }

    const [updated] = await db
      .update(schema.users)
      .set({ passwordHash: await hashPassword(newPassword) })
      .where(eq(schema.users.id, userId))
      .returning();
    return { ok: true, value: updated };
  },
};

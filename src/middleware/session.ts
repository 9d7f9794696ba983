import type { FastifyReply, FastifyRequest } from "fastify";
import { config } from "../config";
import { authService, sessionService } from "../services";
import { createInitialSessionData, type SessionData } from "../types/session";

export const SESSION_COOKIE = "ecospark_session";

export function getCookie(request: FastifyRequest, name: string): string | undefined {
  const raw = request.headers.cookie;
  if (typeof raw !== "string") return undefined;
  const match = new RegExp(`(?:^|;\\s*)${name}=([^;]*)`).exec(raw);
  if (!match?.[1]) return undefined;
  try {
    return decodeURIComponent(match[1].trim());
  } catch {
    return undefined;
  }
}

export function setSessionCookie(reply: FastifyReply, token: string) {
  const parts = [
    `${SESSION_COOKIE}=${encodeURIComponent(token)}`,
    "Path=/",
    "HttpOnly",
    "SameSite=Lax",
    `Max-Age=${config.sessionTtlDays * 24 * 60 * 60}`,
  ];
  if (config.isProduction) parts.push("Secure");
  reply.header("Set-Cookie", parts.join("; "));
}

export function clearSessionCookie(reply: FastifyReply) {
  reply.header("Set-Cookie", `${SESSION_COOKIE}=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0`);
}

/** Resolves the visitor (session and, when signed in, user) for every request. */
export async function loadVisitor(request: FastifyRequest) {
  request.visitor = {
    session: { id: null, userId: null, data: createInitialSessionData() },
    user: null,
  };

  const token = getCookie(request, SESSION_COOKIE);
  if (!token) return;

  const session = await sessionService.load(token);
  if (!session) return;

  request.visitor.session = session;
  if (session.userId !== null) {
    request.visitor.user = (await authService.findById(session.userId)) ?? null;
  }
}

/** Stores session data, creating the session (and its cookie) on first write. */
export async function saveVisitorSession(request: FastifyRequest, reply: FastifyReply, data: SessionData) {
  const current = request.visitor.session;
  if (current.id) {
    await sessionService.save(current.id, data);
    current.data = data;
    return;
  }

  const { token, session } = await sessionService.create(current.userId, data);
  request.visitor.session = session;
  setSessionCookie(reply, token);
}

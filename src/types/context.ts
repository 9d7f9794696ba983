import type { User } from "../db/schema";
import type { SessionData } from "./session";

export interface VisitorSession {
  // Hashed session id; null until something is written for this visitor
  id: string | null;
  userId: number | null;
  data: SessionData;
}

export interface Visitor {
  session: VisitorSession;
  user: User | null;
}

declare module "fastify" {
  interface FastifyRequest {
    visitor: Visitor;
  }
}

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { authService, sessionService, toPublicUser } from "../../services";
import { clearSessionCookie, sendValidationError, setSessionCookie } from "../../middleware";

const registerSchema = z
  .object({
    username: z.string().trim().min(1).max(150),
    email: z.string().trim().toLowerCase().email(),
    firstName: z.string().trim().max(150).default(""),
    lastName: z.string().trim().max(150).default(""),
    password: z.string().min(8, "Password must be at least 8 characters."),
    confirmPassword: z.string(),
  })
  .refine((data) => data.password === data.confirmPassword, {
    message: "Passwords do not match.",
    path: ["confirmPassword"],
  });

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function registerAuthRoutes(app: FastifyInstance) {
  app.post("/auth/register", async (request, reply) => {
    const parsed = registerSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const result = await authService.register(parsed.data);
    if (!result.ok) {
      return reply.code(409).send({ error: "conflict", messages: result.errors });
    }

    return reply.code(201).send({
      user: toPublicUser(result.value),
      message: "User successfully created! You can now log in with your credentials.",
    });
  });

  app.post("/auth/login", async (request, reply) => {
    const parsed = loginSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const user = await authService.authenticate(parsed.data.username, parsed.data.password);
    if (!user) {
      return reply.code(401).send({
        error: "invalid_credentials",
        message: "Invalid username or password. Please try again.",
      });
    }

    const outcome = await authService.login(user, request.visitor.session);
    request.visitor = { session: outcome.session, user };
    setSessionCookie(reply, outcome.token);

    return {
      user: toPublicUser(user),
      mergedCount: outcome.mergedCount,
      message: outcome.message,
      welcome: `Welcome back, ${user.firstName || user.username}!`,
    };
  });

  app.post("/auth/logout", async (request, reply) => {
    const sessionId = request.visitor.session.id;
    if (sessionId) {
      await sessionService.destroy(sessionId);
    }
    clearSessionCookie(reply);
    return { ok: true, message: "You have been logged out successfully." };
  });
}

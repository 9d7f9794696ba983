import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { authService, completionService, creditService, toPublicUser } from "../../services";
import { sendValidationError } from "../../middleware";

const profileSchema = z.object({
  username: z.string().trim().min(1).max(150),
  firstName: z.string().trim().max(150).default(""),
  lastName: z.string().trim().max(150).default(""),
});

const passwordSchema = z
  .object({
    oldPassword: z.string().min(1),
    newPassword: z.string().min(8, "Password must be at least 8 characters."),
    confirmPassword: z.string(),
  })
  .refine((data) => data.newPassword === data.confirmPassword, {
    message: "Passwords do not match.",
    path: ["confirmPassword"],
  });

function unauthorized(reply: FastifyReply) {
  return reply.code(401).send({ error: "unauthorized", message: "Please log in first." });
}

export function registerProfileRoutes(app: FastifyInstance) {
  app.get("/profile", async (request, reply) => {
    const user = request.visitor.user;
    if (!user) return unauthorized(reply);

    const [balance, completions] = await Promise.all([
      creditService.getBalance(user.id),
      completionService.findByUser(user.id),
    ]);
    return { user: toPublicUser(user), balance, completedChallenges: completions.length };
  });

  app.patch("/profile", async (request, reply) => {
    const user = request.visitor.user;
    if (!user) return unauthorized(reply);

    const parsed = profileSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const result = await authService.updateProfile(user.id, parsed.data);
    if (!result.ok) return reply.code(409).send({ error: "conflict", messages: result.errors });

    request.visitor.user = result.value;
    return { user: toPublicUser(result.value), message: "Profile updated successfully!" };
  });

  app.post("/profile/password", async (request, reply) => {
    const user = request.visitor.user;
    if (!user) return unauthorized(reply);

    const parsed = passwordSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const result = await authService.changePassword(user.id, parsed.data.oldPassword, parsed.data.newPassword);
    if (!result.ok) return reply.code(400).send({ error: "invalid_password", messages: result.errors });

    return { message: "Password changed successfully!" };
  });
}

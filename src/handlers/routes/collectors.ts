import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { collectorService, nominationInputSchema } from "../../services";
import { sendValidationError } from "../../middleware";

const collectorQuerySchema = z.object({
  city: z.string().trim().max(100).default(""),
  verified_only: z
    .string()
    .optional()
    .transform((value) => value === "on" || value === "true" || value === "1"),
});

export function registerCollectorRoutes(app: FastifyInstance) {
  app.get("/collectors", async (request, reply) => {
    const parsed = collectorQuerySchema.safeParse(request.query);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { city, verified_only: verifiedOnly } = parsed.data;
    return {
      collectors: collectorService.list({ city, verifiedOnly }),
      cities: collectorService.cities(),
      selectedCity: city,
      verifiedOnly,
      insight: await collectorService.insight(),
    };
  });

  app.post("/collectors/nominations", async (request, reply) => {
    const parsed = nominationInputSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const nomination = await collectorService.nominate(parsed.data);
    return reply.code(201).send({
      nomination,
      message: `Thank you for nominating ${nomination.name}! We'll review and add them if verified.`,
    });
  });
}

import type { FastifyInstance } from "fastify";
import { pickupInputSchema, pickupService } from "../../services";
import { sendValidationError } from "../../middleware";

export function registerPickupRoutes(app: FastifyInstance) {
  app.post("/pickups", async (request, reply) => {
    const parsed = pickupInputSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const pickup = await pickupService.create(parsed.data);
    return reply.code(201).send({
      pickup,
      message: "Your request has been saved! We'll contact you soon.",
    });
  });
}

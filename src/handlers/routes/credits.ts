import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { creditService } from "../../services";
import { sendValidationError } from "../../middleware";

const redeemSchema = z.object({
  deviceModel: z.string().trim().min(1, "Please enter a device model."),
});

export function registerCreditRoutes(app: FastifyInstance) {
  app.get("/credits", async (request) => {
    const user = request.visitor.user;
    return { balance: user ? await creditService.getBalance(user.id) : null };
  });

  app.post("/credits", async (request, reply) => {
    const parsed = redeemSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const user = request.visitor.user;
    const result = await creditService.redeemDevice(user?.id ?? null, parsed.data.deviceModel);
    if (!result) {
      return reply.code(404).send({
        error: "not_found",
        message: "Device model not found. Please ask admin to add it.",
      });
    }

    return {
      modelName: result.device.modelName,
      metalValue: result.device.metalValue,
      pointsAwarded: result.pointsAwarded,
      saved: result.saved,
      balance: result.balance,
      message: result.saved
        ? `${result.pointsAwarded} points added to your balance.`
        : "Login to save your points.",
    };
  });
}

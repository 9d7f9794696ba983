import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { centerService } from "../../services";
import { sendValidationError } from "../../middleware";

const optionalCoordinate = z.coerce.number().finite().optional();

const nearbyQuerySchema = z
  .object({
    lat: z.coerce.number().min(-90).max(90),
    lng: z.coerce.number().min(-180).max(180),
    radius_km: z.coerce.number().finite().optional(),
    sw_lat: optionalCoordinate,
    sw_lng: optionalCoordinate,
    ne_lat: optionalCoordinate,
    ne_lng: optionalCoordinate,
  })
  .transform(({ lat, lng, radius_km, sw_lat, sw_lng, ne_lat, ne_lng }) => ({
    lat,
    lng,
    radiusKm: radius_km,
    bounds:
      sw_lat !== undefined && sw_lng !== undefined && ne_lat !== undefined && ne_lng !== undefined
        ? { southWest: { lat: sw_lat, lng: sw_lng }, northEast: { lat: ne_lat, lng: ne_lng } }
        : undefined,
  }));

export function registerCenterRoutes(app: FastifyInstance) {
  app.get("/centers", async () => {
    const centers = await centerService.list();
    return { centers };
  });

  app.get("/centers/nearby", async (request, reply) => {
    const parsed = nearbyQuerySchema.safeParse(request.query);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const centers = await centerService.findNearby(parsed.data);
    return { centers };
  });
}

import { asc } from "drizzle-orm";
import { db, schema } from "../db";
import type { NewRecyclingCenter, RecyclingCenter } from "../db/schema";
import { config } from "../config";
import { haversineKm, isWithinBounds, type Bounds, type LatLng } from "../utils/geo";
import { clamp, roundTo } from "../utils/math";

export interface NearbyQuery extends LatLng {
  radiusKm?: number;
  bounds?: Bounds;
}

export interface NearbyCenter extends RecyclingCenter {
  distanceKm: number;
}

export function normalizeRadius(radiusKm: number | undefined): number {
  if (radiusKm === undefined || !Number.isFinite(radiusKm)) return config.nearbyDefaultRadiusKm;
  return clamp(radiusKm, config.nearbyMinRadiusKm, config.nearbyMaxRadiusKm);
}

/** Centers within the radius (and the map bounds, when given), nearest first. */
export function selectNearby(centers: RecyclingCenter[], query: NearbyQuery): NearbyCenter[] {
  const radiusKm = normalizeRadius(query.radiusKm);
  const origin = { lat: query.lat, lng: query.lng };

  return centers
    .map((center) => ({
      ...center,
      distanceKm: haversineKm(origin, { lat: center.latitude, lng: center.longitude }),
    }))
    .filter((center) => center.distanceKm <= radiusKm)
    .filter(
      (center) =>
        !query.bounds || isWithinBounds({ lat: center.latitude, lng: center.longitude }, query.bounds)
    )
    .sort((a, b) => a.distanceKm - b.distanceKm)
    .map((center) => ({ ...center, distanceKm: roundTo(center.distanceKm, 2) }));
}

export const centerService = {
  async create(data: NewRecyclingCenter) {
    const [center] = await db.insert(schema.recyclingCenters).values(data).returning();
    return center;
  },

  async list() {
    return db.select().from(schema.recyclingCenters).orderBy(asc(schema.recyclingCenters.name));
  },

  async findNearby(query: NearbyQuery) {
    return selectNearby(await this.list(), query);
  },
};

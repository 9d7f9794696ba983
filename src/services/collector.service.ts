import { z } from "zod";
import { db, schema } from "../db";
import collectorData from "../data/collectors.json";
import { llmService } from "./llm.service";

const collectorSchema = z.object({
  name: z.string(),
  city: z.string(),
  phone: z.string(),
  verified: z.boolean(),
});

export type Collector = z.infer<typeof collectorSchema>;

const collectors: Collector[] = z.array(collectorSchema).parse(collectorData);

export interface CollectorFilter {
  city?: string;
  verifiedOnly?: boolean;
}

export const nominationInputSchema = z.object({
  nomineeName: z.string().trim().min(1, "Please enter the collector's name.").max(100),
  nomineeCity: z.string().trim().min(1, "Please enter the collector's city.").max(100),
  nomineePhone: z.string().trim().max(20).optional(),
});

export type NominationInput = z.infer<typeof nominationInputSchema>;

export const COLLECTOR_INSIGHT_PROMPT =
  "Generate one short sentence (factual) about how most of India's e-waste is handled informally " +
  "and why connecting with verified collectors matters.";

export function filterCollectors(all: readonly Collector[], filter: CollectorFilter): Collector[] {
  const city = filter.city?.trim().toLowerCase();
  return all.filter(
    (collector) =>
      (!city || collector.city.toLowerCase() === city) && (!filter.verifiedOnly || collector.verified)
  );
}

export function listCities(all: readonly Collector[]): string[] {
  return [...new Set(all.map((collector) => collector.city))].sort();
}

export const collectorService = {
  list(filter: CollectorFilter = {}) {
    return filterCollectors(collectors, filter);
  },

  cities() {
    return listCities(collectors);
  },

  insight() {
    return llmService.explain(COLLECTOR_INSIGHT_PROMPT, { maxTokens: 120 });
  },

  async nominate(input: NominationInput) {
    const [nomination] = await db
      .insert(schema.collectorNominations)
      .values({ name: input.nomineeName, city: input.nomineeCity, phone: input.nomineePhone || null })
      .returning();
    console.log(`Collector nomination #${nomination.id}: ${nomination.name} (${nomination.city})`);
    return nomination;
  },
};

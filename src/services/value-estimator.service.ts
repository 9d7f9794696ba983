import { llmService } from "./llm.service";
import { roundTo } from "../utils/math";

export const metalKinds = ["gold", "copper", "silver"] as const;
export type Metal = (typeof metalKinds)[number];

export type MetalAmounts = Record<Metal, number>;

// INR per gram, used when the model does not quote a price
export const defaultPrices: MetalAmounts = { gold: 7000, copper: 0.9, silver: 90 };

const YEARLY_DEPRECIATION = 0.05;
const MIN_DEPRECIATION_FACTOR = 0.3;

export interface MetalEstimate {
  grams: MetalAmounts;
  prices: MetalAmounts;
}

export interface ValueEstimate extends MetalEstimate {
  model: string;
  ageYears: number;
  baseValue: number;
  estimatedPayout: number;
  aiResponse: string;
}

const metalLabels: Record<Metal, string> = { gold: "Gold", copper: "Copper", silver: "Silver" };

export function buildValuePrompt(model: string, ageYears: number): string {
  return (
    `For the electronic device '${model}', ${ageYears} years old, estimate the recoverable gold, ` +
    `copper and silver in grams, and today's market price of each in INR per gram. ` +
    `Reply exactly as: 'Gold: X g, Copper: Y g, Silver: Z g. ` +
    `Prices: Gold ₹A per g, Copper ₹B per g, Silver ₹C per g.'`
  );
}

function readNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = Number(raw.replace(/,/g, ""));
  return Number.isFinite(value) ? value : null;
}

/**
 * Reads gram amounts from the part before "Prices" and prices from the part
 * after it. Anything missing keeps its default.
 */
export function parseMetalEstimate(text: string): MetalEstimate {
  const pricesAt = text.search(/prices/i);
  const amountsPart = pricesAt >= 0 ? text.slice(0, pricesAt) : text;
  const pricesPart = pricesAt >= 0 ? text.slice(pricesAt) : "";

  const grams: MetalAmounts = { gold: 0, copper: 0, silver: 0 };
  const prices: MetalAmounts = { ...defaultPrices };

  for (const metal of metalKinds) {
    const label = metalLabels[metal];
    const amount = new RegExp(`${label}[:\\s]+([\\d.,]+)\\s*g`, "i").exec(amountsPart);
    grams[metal] = readNumber(amount?.[1]) ?? 0;

    const price = new RegExp(`${label}[:\\s]+₹?\\s*([\\d.,]+)`, "i").exec(pricesPart);
    prices[metal] = readNumber(price?.[1]) ?? defaultPrices[metal];
  }

  return { grams, prices };
}

export function depreciationFactor(ageYears: number): number {
  return Math.max(MIN_DEPRECIATION_FACTOR, 1 - ageYears * YEARLY_DEPRECIATION);
}

export function estimatePayout(estimate: MetalEstimate, ageYears: number) {
  const baseValue = metalKinds.reduce(
    (sum, metal) => sum + estimate.grams[metal] * estimate.prices[metal],
    0
  );
  return {
    baseValue: roundTo(baseValue, 2),
    estimatedPayout: roundTo(baseValue * depreciationFactor(ageYears), 2),
  };
}

export const valueEstimatorService = {
  async estimate(model: string, ageYears: number): Promise<ValueEstimate> {
    const aiResponse = await llmService.explain(buildValuePrompt(model, ageYears), { maxTokens: 200 });
    const parsed = parseMetalEstimate(aiResponse);
    return { model, ageYears, ...parsed, ...estimatePayout(parsed, ageYears), aiResponse };
  },
};

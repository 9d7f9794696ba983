import { FALLBACK_EXPLANATION, llmService } from "./llm.service";

export interface EcoTip {
  date: string;
  tip: string;
}

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildTipPrompt(date: string): string {
  return (
    `Provide one practical eco-friendly tip for daily life, related to e-waste, energy saving, or recycling. ` +
    `Keep it to 1-2 sentences, friendly in tone. Date context: ${date}.`
  );
}

// One tip per day; only the current day is kept
let cached: EcoTip | null = null;

export const ecoTipService = {
  async tipFor(date: Date = new Date()): Promise<EcoTip> {
    const day = isoDate(date);
    if (cached?.date === day) return cached;

    const tip = await llmService.explain(buildTipPrompt(day), { maxTokens: 120 });
    const result = { date: day, tip };
    // A fallback is not the day's tip; ask again next time
    if (tip !== FALLBACK_EXPLANATION) cached = result;
    return result;
  },

  clearCache() {
    cached = null;
  },
};

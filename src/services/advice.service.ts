import { llmService } from "./llm.service";

export type Decision = "Recycle" | "Reuse";

export const reuseActions = ["Sell", "Donate", "Repair", "Recycle"] as const;
export type ReuseAction = (typeof reuseActions)[number];

export interface DecisionAdvice {
  item: string;
  decision: Decision;
  reason: string;
}

export interface DeviceDetails {
  model: string;
  condition: string;
  ageYears: number | null;
}

export interface ReuseAdvice {
  recommendation: ReuseAction;
  reasoning: string;
  // Repair and donation need a nearby shop or charity
  needsLocation: boolean;
}

interface Recommendation {
  line: string;
  rest: string;
}

/** Splits a reply at its `RECOMMENDATION:` line, if it has one. */
export function readRecommendation(text: string): Recommendation | null {
  const match = /recommendation\s*:\s*([^\n]*)\n?([\s\S]*)$/i.exec(text);
  if (!match) return null;
  return { line: (match[1] ?? "").trim(), rest: (match[2] ?? "").trim() };
}

export function buildDecisionPrompt(item: string): string {
  return (
    `Analyze the item '${item}' and determine if it should be RECYCLED or REUSED. ` +
    `Consider: Can it be repaired and used again? Is it too old or broken? ` +
    `Respond in this exact format: First line: 'RECOMMENDATION: [Recycle OR Reuse]' ` +
    `Second line: A brief 2-3 sentence explanation of why this is the best option, ` +
    `focusing specifically on '${item}' and its condition/age.`
  );
}

export function parseDecision(text: string): Omit<DecisionAdvice, "item"> {
  const recommendation = readRecommendation(text);
  if (recommendation) {
    return {
      decision: /reuse/i.test(recommendation.line) ? "Reuse" : "Recycle",
      reason: recommendation.rest || text.trim(),
    };
  }

  const opening = text.trim().toLowerCase();
  const reuse = opening.startsWith("reuse") || opening.slice(0, 50).includes(" reuse ");
  return { decision: reuse ? "Reuse" : "Recycle", reason: text.trim() };
}

export function buildReusePrompt(details: DeviceDetails): string {
  const model = details.model || "electronic device";
  const age = details.ageYears === null ? "unknown" : String(details.ageYears);
  const condition = details.condition || "unspecified";
  return (
    `For a ${model} that is ${age} years old with condition: ${condition}, ` +
    `recommend the best action: SELL, DONATE, REPAIR, or RECYCLE. ` +
    `Format your response as: 'RECOMMENDATION: [Action]' on first line, ` +
    `then 2-3 sentences explaining why this is best, considering age, condition, and environmental impact.`
  );
}

function firstAction(text: string): ReuseAction | null {
  const lower = text.toLowerCase();
  let found: { action: ReuseAction; at: number } | null = null;
  for (const action of reuseActions) {
    const at = lower.indexOf(action.toLowerCase());
    if (at >= 0 && (found === null || at < found.at)) {
      found = { action, at };
    }
  }
  return found?.action ?? null;
}

/**
 * Reads the action from the `RECOMMENDATION:` line, or failing that from the
 * first 100 characters of the reply. Anything unrecognised becomes Recycle.
 */
export function parseReuseAdvice(text: string): ReuseAdvice {
  const recommendation = readRecommendation(text);
  const recommended = recommendation ? firstAction(recommendation.line) : firstAction(text.slice(0, 100));
  const action = recommended ?? "Recycle";

  return {
    recommendation: action,
    reasoning: recommendation?.rest || text.trim(),
    needsLocation: action === "Repair" || action === "Donate",
  };
}

export const adviceService = {
  async decide(item: string): Promise<DecisionAdvice> {
    const reply = await llmService.explain(buildDecisionPrompt(item), { maxTokens: 250 });
    return { item, ...parseDecision(reply) };
  },

  async reuse(details: DeviceDetails): Promise<ReuseAdvice> {
    const reply = await llmService.explain(buildReusePrompt(details), { maxTokens: 250 });
    return parseReuseAdvice(reply);
  },
};

import { config } from "../config";

const OPENROUTER_URL = "https://openrouter.ai/api/v1/chat/completions";
const MODEL = "google/gemini-2.0-flash-001";
const REQUEST_TIMEOUT_MS = 30_000;

export const FALLBACK_EXPLANATION =
  "AI explanations are unavailable right now. Please try again later.";

function readContent(data: unknown): string {
  if (typeof data !== "object" || data === null || !("choices" in data)) return "";
  const { choices } = data;
  if (!Array.isArray(choices)) return "";

  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) return "";
  const { message } = first;
  if (typeof message !== "object" || message === null || !("content" in message)) return "";
  return typeof message.content === "string" ? message.content.trim() : "";
}

export function buildEducationPrompt(topic: string): string {
  return (
    `Explain why '${topic}' found in electronic waste is harmful to people and the environment. ` +
    `If '${topic}' is not usually part of e-waste, say so and name e-waste components that are. ` +
    `Answer in 3-4 plain sentences.`
  );
}

export function buildHazardPrompt(component: string): string {
  return (
    `Describe how '${component}' from discarded electronics (phones, laptops, TVs) harms soil, ` +
    `water and human health when it is dumped or burned. If it is not an e-waste component, ` +
    `say so and suggest components that are. Answer in 3-4 sentences.`
  );
}

export const llmService = {
  /**
   * Single-turn completion. Never throws: any failure yields the fallback text.
   */
  async explain(prompt: string, options: { maxTokens?: number } = {}): Promise<string> {
    if (!config.openRouterApiKey) {
      console.warn("OpenRouter API key not configured, skipping AI explanation");
      return FALLBACK_EXPLANATION;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await fetch(OPENROUTER_URL, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${config.openRouterApiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: MODEL,
          messages: [{ role: "user", content: prompt }],
          max_tokens: options.maxTokens ?? 400,
          temperature: 0.3,
          stream: false,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        console.error("LLM API error:", response.status, await response.text());
        return FALLBACK_EXPLANATION;
      }

      const content = readContent(await response.json());
      if (!content) console.warn("LLM reply had no text, using fallback");
      return content || FALLBACK_EXPLANATION;
    } catch (error) {
      if (controller.signal.aborted) {
        console.error(`LLM request timed out after ${REQUEST_TIMEOUT_MS}ms`);
      } else {
        console.error("LLM request error:", error);
      }
      return FALLBACK_EXPLANATION;
    } finally {
      clearTimeout(timer);
    }
  },
};

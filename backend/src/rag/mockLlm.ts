// backend/src/rag/mockLlm.ts

import type { LLMProvider } from "./llm";

const NOT_FOUND_ANSWER = "I don't know based on the provided card data.";
const MAX_LINES = 5;

/**
 * "card.lounge_access.domestic: 8 visits" style lines for every leaf value
 */
export function flattenContext(value: unknown, prefix = ""): string[] {
  if (value === null || value === undefined) return [];

  if (Array.isArray(value)) {
    return value.flatMap((item) => flattenContext(item, prefix));
  }

  if (typeof value === "object") {
    return Object.entries(value).flatMap(([key, child]) =>
      flattenContext(child, prefix ? `${prefix}.${key}` : key)
    );
  }

  return [`${prefix}: ${String(value)}`];
}

/**
 * Simple query-aware mock answer
 * Picks the context lines sharing a word with the query instead of calling a model
 */
export function generateMockAnswer(query: string, context: unknown): string {
  const queryTerms = query
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, "")
    .split(/\s+/)
    .filter((term) => term.length > 3);

  if (queryTerms.length === 0) {
    return NOT_FOUND_ANSWER;
  }

  const lines = flattenContext(context).filter((line) => {
    const lower = line.toLowerCase();
    return queryTerms.some((term) => lower.includes(term));
  });

  if (lines.length === 0) {
    return NOT_FOUND_ANSWER;
  }

  // Deduplicate & limit
  const unique = Array.from(new Set(lines)).slice(0, MAX_LINES);

  return unique.map((line) => `- ${line}`).join("\n");
}

/**
 * Offline provider, selected with LLM_PROVIDER_ORDER=mock
 */
export function createMockProvider(): LLMProvider {
  return {
    name: "mock",
    async complete({ query, context }) {
      return generateMockAnswer(query, context.cards);
    },
  };
}

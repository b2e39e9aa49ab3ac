// Orchestration - Query Router
import type { SearchType } from "../../../../shared/types";
import { ROUTE_LOCALE, ROUTE_VECTOR_PHRASES } from "../../config/constants";

export type RouteTag = SearchType;

export interface RoutePolicy {
  classify(question: string): RouteTag;
}

/**
 * "Definitional" phrases per deployment language. A question containing one of
 * them is answered from plain vector hits; anything else gets neighbour context.
 */
export const DEFINITIONAL_PHRASES: Record<string, readonly string[]> = {
  en: ["what is", "what are", "explain", "tell me about", "define", "meaning of"],
  ru: ["что такое", "объясни", "расскажи"]
};

export function phrasesForLocale(locale: string, override: readonly string[] = []): string[] {
  if (override.length > 0) return override.map((p) => p.toLowerCase());
  const phrases = DEFINITIONAL_PHRASES[locale] ?? DEFINITIONAL_PHRASES.en;
  return phrases.map((p) => p.toLowerCase());
}

/**
 * Heuristic keyword routing (no API cost): case-insensitive substring match.
 */
export function createPhraseRoutePolicy(phrases: readonly string[]): RoutePolicy {
  const needles = phrases.map((p) => p.toLowerCase()).filter(Boolean);
  return {
    classify(question: string): RouteTag {
      const q = question.toLowerCase();
      return needles.some((p) => q.includes(p)) ? "vector" : "hybrid";
    }
  };
}

export const defaultRoutePolicy = createPhraseRoutePolicy(
  phrasesForLocale(ROUTE_LOCALE, ROUTE_VECTOR_PHRASES)
);

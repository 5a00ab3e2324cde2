/**
 * Tunables for the conversational search subsystem. Hosts either pass overrides directly or
 * derive them from environment variables; invalid values fall back to the defaults.
 */

interface RawEnv {
  readonly [key: string]: string | undefined;
}

/**
 * What to do with a unit that contains every query token but not the query as one contiguous
 * phrase: drop it, or keep it with a snippet centred on the first token occurrence.
 */
export type UnmatchedPhrasePolicy = "drop" | "tokenSnippet";

export interface SearchConfig {
  readonly debounceMs: number;
  readonly maxResults: number;
  /** Characters of context kept on each side of a match in snippets. */
  readonly snippetContext: number;
  /** Viewport distances closer than this are treated as equal when ranking. */
  readonly proximityThreshold: number;
  readonly unmatchedPhrasePolicy: UnmatchedPhrasePolicy;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  debounceMs: 200,
  maxResults: 100,
  snippetContext: 60,
  proximityThreshold: 100,
  unmatchedPhrasePolicy: "drop"
};

const positiveOr = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
};

const toInt = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const toPolicy = (value: string | undefined): UnmatchedPhrasePolicy | undefined => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "drop") {
    return "drop";
  }
  if (normalized === "tokensnippet" || normalized === "token-snippet") {
    return "tokenSnippet";
  }
  return undefined;
};

export const resolveSearchConfig = (overrides: Partial<SearchConfig> = {}): SearchConfig => ({
  debounceMs: positiveOr(overrides.debounceMs, DEFAULT_SEARCH_CONFIG.debounceMs),
  maxResults: Math.floor(positiveOr(overrides.maxResults, DEFAULT_SEARCH_CONFIG.maxResults)),
  snippetContext: Math.floor(positiveOr(overrides.snippetContext, DEFAULT_SEARCH_CONFIG.snippetContext)),
  proximityThreshold: positiveOr(overrides.proximityThreshold, DEFAULT_SEARCH_CONFIG.proximityThreshold),
  unmatchedPhrasePolicy: overrides.unmatchedPhrasePolicy ?? DEFAULT_SEARCH_CONFIG.unmatchedPhrasePolicy
});

export const searchConfigFromEnv = (env: RawEnv): SearchConfig =>
  resolveSearchConfig({
    debounceMs: toInt(env.SEARCH_DEBOUNCE_MS),
    maxResults: toInt(env.SEARCH_MAX_RESULTS),
    snippetContext: toInt(env.SEARCH_SNIPPET_CONTEXT),
    proximityThreshold: toInt(env.SEARCH_PROXIMITY_THRESHOLD),
    unmatchedPhrasePolicy: toPolicy(env.SEARCH_UNMATCHED_PHRASE_POLICY)
  });

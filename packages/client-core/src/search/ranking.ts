/**
 * Result ordering. Criteria in priority order: node title contains the query, unit text contains
 * the query verbatim, proximity to the viewport centre (beyond a noise threshold), recency.
 * Array.prototype.sort is stable, so full ties keep construction order.
 */
import type { CanvasPoint } from "../types";
import type { SearchResult } from "./types";

export interface RankingOptions {
  readonly viewportCenter?: CanvasPoint | null;
  readonly proximityThreshold: number;
  readonly limit: number;
}

const distanceBetween = (a: CanvasPoint, b: CanvasPoint): number => Math.hypot(a.x - b.x, a.y - b.y);

export const compareSearchResults = (
  a: SearchResult,
  b: SearchResult,
  normalizedQuery: string,
  options: Pick<RankingOptions, "viewportCenter" | "proximityThreshold">
): number => {
  const aInTitle = a.nodeTitle.toLowerCase().includes(normalizedQuery);
  const bInTitle = b.nodeTitle.toLowerCase().includes(normalizedQuery);
  if (aInTitle !== bInTitle) {
    return aInTitle ? -1 : 1;
  }

  const aExact = a.fullUnitText.toLowerCase().includes(normalizedQuery);
  const bExact = b.fullUnitText.toLowerCase().includes(normalizedQuery);
  if (aExact !== bExact) {
    return aExact ? -1 : 1;
  }

  const center = options.viewportCenter;
  if (center) {
    const aDistance = distanceBetween(a.nodePosition, center);
    const bDistance = distanceBetween(b.nodePosition, center);
    if (Math.abs(aDistance - bDistance) > options.proximityThreshold) {
      return aDistance < bDistance ? -1 : 1;
    }
  }

  return b.timestamp - a.timestamp;
};

export const rankSearchResults = (
  results: readonly SearchResult[],
  query: string,
  options: RankingOptions
): SearchResult[] => {
  const normalizedQuery = query.toLowerCase();
  return [...results]
    .sort((a, b) => compareSearchResults(a, b, normalizedQuery, options))
    .slice(0, options.limit);
};

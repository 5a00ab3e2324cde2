/**
 * Snippet extraction for search results: a bounded window of context around the match with
 * markdown markup removed so the excerpt reads as plain text.
 */
import type { MatchRange } from "./types";

const ELLIPSIS = "…";

const MARKDOWN_REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\*\*([^*]+)\*\*/g, "$1"],
  [/__([^_]+)__/g, "$1"],
  [/\*([^*]+)\*/g, "$1"],
  [/_([^_]+)_/g, "$1"],
  [/`([^`]+)`/g, "$1"],
  [/^#{1,6}\s*/, ""],
  [/^[-*]\s+/, ""],
  [/^\d+\.\s+/, ""],
  [/\[([^\]]+)\]\([^)]+\)/g, "$1"],
  [/\s\*\s/g, " "],
  [/ {2,}/g, " "]
];

/** Removes emphasis, inline code, heading, list and link markup from a single line of text. */
export const stripMarkdown = (text: string): string => {
  return MARKDOWN_REPLACEMENTS.reduce(
    (current, [pattern, replacement]) => current.replace(pattern, replacement),
    text
  );
};

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/** Widens window bounds that would split a surrogate pair. */
const alignToCodePoints = (text: string, lower: number, upper: number): [number, number] => {
  const start =
    lower > 0 && isLowSurrogate(text.charCodeAt(lower)) && isHighSurrogate(text.charCodeAt(lower - 1))
      ? lower - 1
      : lower;
  const end =
    upper > 0 && upper < text.length && isHighSurrogate(text.charCodeAt(upper - 1)) ? upper + 1 : upper;
  return [start, end];
};

export const generateSnippet = (text: string, match: MatchRange, context: number): string => {
  const [lower, upper] = alignToCodePoints(
    text,
    Math.max(0, match.start - context),
    Math.min(text.length, match.end + context)
  );

  // Line-anchored markup is stripped per line, before the lines are joined.
  const body = text
    .slice(lower, upper)
    .split(/\r?\n/)
    .map(stripMarkdown)
    .join(" ")
    .replace(/ {2,}/g, " ")
    .trim();

  const prefix = lower > 0 ? ELLIPSIS : "";
  const suffix = upper < text.length ? ELLIPSIS : "";
  return `${prefix}${body}${suffix}`;
};

import type { BracketStyle, CleaningProfile } from "../types.js";

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Regexes and lookups built once per profile */
export interface CompiledRules {
  metadataKeywords: string[];
  bracketPatterns: RegExp[];
  noisePattern: RegExp | null;
  typoPattern: RegExp | null;
  typoMap: Map<string, string>;
}

// WebVTT tags such as <i>, </i>, <c.yellow> and <00:01:02.500>. A "<" followed
// by a space is left alone, so "a < b" survives.
const MARKUP_PATTERN = /<(?:\/?[A-Za-z][^<>]*|\d[\d:.]*)>/g;

const compiledCache = new WeakMap<CleaningProfile, CompiledRules>();

function bracketPattern({ open, close }: BracketStyle): RegExp {
  return new RegExp(`${escapeRegExp(open)}.*?${escapeRegExp(close)}`, "g");
}

// Alternation of the given strings, longest first so a longer entry wins over
// any shorter entry it contains
function alternation(entries: string[]): RegExp | null {
  const unique = [...new Set(entries.filter((entry) => entry.length > 0))];
  if (unique.length === 0) return null;
  unique.sort((a, b) => b.length - a.length);
  return new RegExp(unique.map(escapeRegExp).join("|"), "g");
}

export function compileRules(profile: CleaningProfile): CompiledRules {
  const cached = compiledCache.get(profile);
  if (cached) return cached;

  const compiled: CompiledRules = {
    metadataKeywords: profile.metadataKeywords.filter((k) => k.length > 0),
    bracketPatterns: profile.bracketStyles.map(bracketPattern),
    noisePattern: alternation(profile.noiseCharacters),
    typoPattern: alternation(Object.keys(profile.typoMap)),
    typoMap: new Map(Object.entries(profile.typoMap)),
  };
  compiledCache.set(profile, compiled);
  return compiled;
}

export function isMetadataLine(line: string, rules: CompiledRules): boolean {
  return rules.metadataKeywords.some((keyword) => line.includes(keyword));
}

// Removing a match can join its neighbours into a new one, e.g. "ab" in "aabb"
function removeUntilStable(text: string, pattern: RegExp): string {
  let current = text;
  for (;;) {
    const next = current.replace(pattern, "");
    if (next === current) return current;
    current = next;
  }
}

export function removeMarkup(text: string): string {
  return removeUntilStable(text, MARKUP_PATTERN);
}

export function removeBracketed(text: string, rules: CompiledRules): string {
  return rules.bracketPatterns.reduce(
    (current, pattern) => current.replace(pattern, ""),
    text
  );
}

export function removeNoise(text: string, rules: CompiledRules): string {
  return rules.noisePattern
    ? removeUntilStable(text, rules.noisePattern)
    : text;
}

/**
 * Replaces every known typo in a single pass, so a correction is never
 * rewritten again by a shorter key.
 */
export function correctTypos(text: string, rules: CompiledRules): string {
  const { typoPattern, typoMap } = rules;
  if (!typoPattern) return text;
  return text.replace(typoPattern, (match) => typoMap.get(match) ?? match);
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

import type { FlatMapping } from "./flatten.js";

/** Anything still shaped like a placeholder after substitution. */
const LEFTOVER_TOKEN = /\{\{[^}]+\}\}/g;

export interface SubstitutionResult {
  html: string;
  /** Distinct leftover `{{...}}` tokens, sorted. */
  unresolved: string[];
}

export function placeholderToken(key: string): string {
  return `{{${key}}}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pattern renderer for short strings such as preview URLs: replaces {name}
 * with the context value and leaves unknown names untouched.
 */
export function renderPattern(
  pattern: string,
  context: Record<string, string>,
): string {
  return pattern.replace(/\{(\w+)\}/g, (match, key: string) => {
    return Object.hasOwn(context, key) ? context[key] : match;
  });
}

export function findUnresolved(text: string): string[] {
  const found = new Set(text.match(LEFTOVER_TOKEN) ?? []);
  return [...found].sort();
}

/**
 * Replace every literal `{{key}}` token for every key in the mapping.
 *
 * All known tokens are matched in one left-to-right pass, so a value that
 * itself contains a token is inserted as-is. Longer tokens are tried first
 * where two known tokens start at the same offset.
 */
export function substitute(template: string, mapping: FlatMapping): SubstitutionResult {
  const tokens = Object.keys(mapping)
    .map(placeholderToken)
    .sort((a, b) => b.length - a.length);

  let html = template;
  if (tokens.length > 0) {
    const pattern = new RegExp(tokens.map(escapeRegExp).join("|"), "g");
    html = template.replace(pattern, (token) => mapping[token.slice(2, -2)]);
  }

  return { html, unresolved: findUnresolved(html) };
}

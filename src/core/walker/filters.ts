// src/core/walker/filters.ts

/**
 * Split a comma-separated filter into lower-cased, trimmed, non-empty terms
 */
export function parseTerms(filter: string | undefined): string[] {
  if (!filter) return [];
  return filter
    .split(',')
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0);
}

export function normalizeTerms(terms: string[]): string[] {
  return terms.map((term) => term.trim().toLowerCase()).filter((term) => term.length > 0);
}

/** Every term is a case-insensitive substring of name; an empty term list matches */
export function matchesAllTerms(name: string, terms: string[]): boolean {
  const haystack = name.toLowerCase();
  return terms.every((term) => haystack.includes(term));
}

/** At least one term is a case-insensitive substring of name */
export function matchesAnyTerm(name: string, terms: string[]): boolean {
  const haystack = name.toLowerCase();
  return terms.some((term) => haystack.includes(term));
}

import type { MetadataFilters } from '@statute-rag/shared';

/**
 * Query Filters
 *
 * Reads a named Act and a single section or article number out of the
 * question and turns them into metadata filters on the `act` and
 * `sectionNumber` keys. Nothing is derived when the question names more
 * than one of either.
 */

const SECTION_PATTERN = /\b(?:section|sec\.?|s\.|article|art\.)\s*(\d+[a-z]?)\b/gi;

// Up to five words in front of "act"; the Act's name is the trailing run of
// words that are not stop words.
const ACT_PATTERN = /\b((?:[a-z][a-z'-]*\s+){1,5})act\b/gi;

const STOP_WORDS = new Set([
  'a',
  'an',
  'and',
  'any',
  'are',
  'as',
  'by',
  'can',
  'does',
  'for',
  'from',
  'how',
  'in',
  'is',
  'my',
  'of',
  'or',
  'said',
  'that',
  'the',
  'this',
  'to',
  'under',
  'what',
  'which',
]);

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function sectionNumbers(query: string): string[] {
  const found = [...query.matchAll(SECTION_PATTERN)].map((match) => match[1].toUpperCase());
  return [...new Set(found)];
}

function actNames(query: string): string[] {
  const names: string[] = [];
  for (const match of query.matchAll(ACT_PATTERN)) {
    const words = match[1].trim().split(/\s+/);
    const name: string[] = [];
    for (let i = words.length - 1; i >= 0 && !STOP_WORDS.has(words[i].toLowerCase()); i--) {
      name.unshift(titleCase(words[i]));
    }
    if (name.length > 0) {
      names.push(`${name.join(' ')} Act`);
    }
  }
  return [...new Set(names)];
}

export function deriveQueryFilters(query: string): MetadataFilters {
  const filters: MetadataFilters = {};

  const acts = actNames(query);
  if (acts.length === 1) {
    filters.act = acts[0];
  }

  const sections = sectionNumbers(query);
  if (sections.length === 1) {
    filters.sectionNumber = sections[0];
  }

  return filters;
}

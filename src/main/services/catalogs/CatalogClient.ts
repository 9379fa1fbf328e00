import type { CatalogEntry, CatalogName } from '../../../shared/models';

/**
 * Capability every metadata catalog offers to the resolver.
 */
export interface CatalogClient {
  readonly name: Exclude<CatalogName, ''>;
  /** Candidates for a search term, in the catalog's relevance order. */
  searchTitles(term: string, signal?: AbortSignal): Promise<CatalogEntry[]>;
  /** Full record for an accepted candidate, when search results are abbreviated. */
  fetchEntry?(id: string, signal?: AbortSignal): Promise<CatalogEntry | null>;
}

export type FetchFunction = typeof fetch;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  mdash: '—',
  ndash: '–',
  hellip: '…',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“'
};

/**
 * Turns catalog descriptions into plain text: line-break tags become newlines,
 * remaining tags are dropped and entities are decoded.
 */
export function toPlainText(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity.startsWith('#')) {
        const hex = entity[1] === 'x' || entity[1] === 'X';
        const codePoint = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
        return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
      }
      return ENTITIES[entity.toLowerCase()] ?? match;
    })
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Deduplicates titles while keeping their first-seen order.
 */
export function uniqueTitles(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}

export const DEFAULT_MATCH_THRESHOLD = 0.6;

/** Score for unequal strings whose token sets coincide (word order or repeats differ). */
const SAME_TOKENS_SCORE = 0.99;

const BRACKETED = /\[[^\]]*\]|\([^)]*\)|\{[^}]*\}|【[^】]*】/g;
const PUNCTUATION = /[^\p{L}\p{N}\s]+/gu;
const LEADING_ARTICLE = /^(?:the|a|an)\s+/;

const SEASON_MARKER = /^(?:s\d{1,2}|season\d{1,2}|part\d{1,2}|cour\d)$/;
const EPISODE_MARKER = /^(?:s\d{1,2}e\d{1,4}|\d{1,2}x\d{2,4}|e\d{1,4}|ep\d{1,4})$/;
const QUALITY_MARKER =
  /^(?:\d{3,4}p|[xh]26[45]|hevc|avc|bluray|bdrip|brrip|bd|webrip|webdl|web|dl|remux|hdr|10bit|8bit|dual|multi|aac|flac|ac3|dts|uncensored)$/;
const YEAR_MARKER = /^(?:19|20)\d{2}$/;
const ORDINAL = /^\d+(?:st|nd|rd|th)$/;

/**
 * Candidate paired with its similarity score.
 */
export interface ScoredCandidate<T> {
  candidate: T;
  score: number;
}

/**
 * Case-folds a title and strips bracketed tags, punctuation and one leading article.
 */
export function normalizeTitle(value: string): string {
  return value
    .normalize('NFKC')
    .toLowerCase()
    .replace(BRACKETED, ' ')
    .replace(PUNCTUATION, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(LEADING_ARTICLE, '');
}

/**
 * Turns a folder name into a readable catalog search term: bracketed release tags,
 * separators and trailing season/episode/quality markers are removed.
 *
 * A bare trailing year stays part of the title ("Blade Runner 2049") unless it sits in a
 * release tail: the name is dot- or underscore-separated, or other markers followed it.
 */
export function deriveSearchTerm(folderName: string): string {
  const unbracketed = folderName.normalize('NFKC').replace(BRACKETED, ' ').trim();
  const tokens = unbracketed
    .replace(/[._]+/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0 && token !== '-');
  let inReleaseTail = /[._]/.test(unbracketed) && !/\s/.test(unbracketed);

  while (tokens.length > 1) {
    const last = compact(tokens[tokens.length - 1]);
    const previous = compact(tokens[tokens.length - 2]);
    if (last === '' || SEASON_MARKER.test(last) || EPISODE_MARKER.test(last) || QUALITY_MARKER.test(last)) {
      tokens.pop();
      inReleaseTail = true;
      continue;
    }
    if (inReleaseTail && YEAR_MARKER.test(last)) {
      tokens.pop();
      continue;
    }
    if (/^\d{1,2}$/.test(last) && (previous === 'season' || previous === 'part')) {
      tokens.splice(-2, 2);
      inReleaseTail = true;
      continue;
    }
    if (last === 'season' && ORDINAL.test(previous)) {
      tokens.splice(-2, 2);
      inReleaseTail = true;
      continue;
    }
    break;
  }

  return tokens.join(' ').replace(/[\s:\-–]+$/, '').trim();
}

/**
 * Symmetric similarity of two normalized titles.
 * Equal titles (ignoring spaces) score 1; otherwise the Sørensen–Dice overlap of their word sets.
 */
export function similarity(left: string, right: string): number {
  if (left.length === 0 || right.length === 0) {
    return 0;
  }
  if (left.replace(/\s/g, '') === right.replace(/\s/g, '')) {
    return 1;
  }
  const leftTokens = new Set(left.split(' '));
  const rightTokens = new Set(right.split(' '));
  let shared = 0;
  for (const token of leftTokens) {
    if (rightTokens.has(token)) {
      shared += 1;
    }
  }
  const dice = (2 * shared) / (leftTokens.size + rightTokens.size);
  return Math.min(dice, SAME_TOKENS_SCORE);
}

/**
 * Compares remote titles and folder names against catalog title sets.
 */
export class TitleMatcher {
  public constructor(public readonly threshold: number = DEFAULT_MATCH_THRESHOLD) {
    if (!(threshold > 0 && threshold <= 1)) {
      throw new RangeError(`Match threshold must be within (0, 1], got ${threshold}`);
    }
  }

  /**
   * Best score of a remote title against any of the candidate titles.
   */
  public match(remoteTitle: string, candidates: Iterable<string>): number {
    return this.bestAgainst(normalizeTitle(remoteTitle), candidates);
  }

  /**
   * Like {@link match}, after trailing season and quality markers are dropped from the folder name.
   */
  public matchFolder(folderName: string, candidates: Iterable<string>): number {
    return this.bestAgainst(normalizeTitle(deriveSearchTerm(folderName)), candidates);
  }

  public accepts(score: number): boolean {
    return score >= this.threshold;
  }

  /**
   * Highest-scoring candidate that clears the threshold. Exact ties keep the earlier entry,
   * so callers list candidates in source query order.
   */
  public pickBest<T>(scored: ReadonlyArray<ScoredCandidate<T>>): ScoredCandidate<T> | null {
    let best: ScoredCandidate<T> | null = null;
    for (const entry of scored) {
      if (!this.accepts(entry.score)) {
        continue;
      }
      if (!best || entry.score > best.score) {
        best = entry;
      }
    }
    return best;
  }

  private bestAgainst(normalized: string, candidates: Iterable<string>): number {
    let best = 0;
    for (const candidate of candidates) {
      const score = similarity(normalized, normalizeTitle(candidate));
      if (score > best) {
        best = score;
      }
      if (best === 1) {
        break;
      }
    }
    return best;
  }
}

function compact(token: string | undefined): string {
  return (token ?? '').toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '');
}

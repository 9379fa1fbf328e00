import path from 'node:path';
import type { CatalogEntry, FolderIdentity } from '../../shared/models';
import { describeError } from '../../shared/errors';
import type { CatalogClient } from './catalogs/CatalogClient';
import { coverFileName } from './CoverImageService';
import { IdentityCacheService, normalizeFolderPath } from './IdentityCacheService';
import { TitleMatcher, deriveSearchTerm } from './TitleMatcher';
import type { ScoredCandidate } from './TitleMatcher';
import { withDeadline } from '../utils/deadline';
import { logger } from '../logger';

interface SourcedEntry {
  client: CatalogClient;
  entry: CatalogEntry;
}

export interface MetadataResolverOptions {
  cache: IdentityCacheService;
  matcher: TitleMatcher;
  primary: CatalogClient;
  secondary?: CatalogClient | null;
  /** Deadline applied to each catalog call. */
  requestTimeoutMs?: number;
  now?: () => number;
}

export interface ResolveOptions {
  /** Title reported by the media server; scored alongside the folder name. */
  remoteTitle?: string;
  signal?: AbortSignal;
}

/**
 * Resolves local folders to catalog identities, cache first.
 * Every folder gets at most one catalog query sequence for the lifetime of its cache entry.
 */
export class MetadataResolver {
  private readonly cache: IdentityCacheService;
  private readonly matcher: TitleMatcher;
  private readonly primary: CatalogClient;
  private readonly secondary: CatalogClient | null;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;

  public constructor(options: MetadataResolverOptions) {
    this.cache = options.cache;
    this.matcher = options.matcher;
    this.primary = options.primary;
    this.secondary = options.secondary ?? null;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 6000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the cached identity for a folder or resolves and persists a new one.
   * Catalog failures count as "no candidate"; the outcome is persisted either way.
   */
  public async resolve(folderPath: string, options: ResolveOptions = {}): Promise<FolderIdentity> {
    const key = normalizeFolderPath(folderPath);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const folderName = path.basename(key);
    const term = deriveSearchTerm(folderName) || folderName;
    const pool: ScoredCandidate<SourcedEntry>[] = [];

    pool.push(...(await this.searchAndScore(this.primary, term, folderName, options)));
    let best = this.matcher.pickBest(pool);

    if (!best && this.secondary) {
      pool.push(...(await this.searchAndScore(this.secondary, term, folderName, options)));
      best = this.matcher.pickBest(pool);
    }

    if (!best) {
      logger.warn(`✖ No catalog match for "${folderName}" (searched "${term}", ${pool.length} candidates)`);
      return this.cache.put(this.unresolved(key));
    }

    const { client, entry } = best.candidate;
    const full = await this.completeEntry(client, entry, options.signal);
    logger.info(
      `✔ Matched "${folderName}" to ${client.name}:${full.id} "${full.romajiTitle || full.englishTitle}" (score ${best.score.toFixed(2)})`
    );
    return this.cache.put({
      folderPath: key,
      sourceId: full.id,
      catalog: client.name,
      romajiTitle: full.romajiTitle,
      englishTitle: full.englishTitle,
      synopsis: full.synopsis,
      imageFileName: coverFileName(client.name, full.id, full.imageUrl),
      imageUrl: full.imageUrl,
      resolvedAt: this.now()
    });
  }

  private async searchAndScore(
    client: CatalogClient,
    term: string,
    folderName: string,
    options: ResolveOptions
  ): Promise<ScoredCandidate<SourcedEntry>[]> {
    let entries: CatalogEntry[];
    try {
      entries = await withDeadline(this.requestTimeoutMs, options.signal, (signal) => client.searchTitles(term, signal));
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      logger.warn(`⚠ ${client.name} search for "${term}" failed: ${describeError(error)}`);
      return [];
    }

    logger.debug(`${client.name} returned ${entries.length} candidates for "${term}"`);
    return entries.map((entry) => {
      const folderScore = this.matcher.matchFolder(folderName, entry.titles);
      const remoteScore = options.remoteTitle ? this.matcher.match(options.remoteTitle, entry.titles) : 0;
      return { candidate: { client, entry }, score: Math.max(folderScore, remoteScore) };
    });
  }

  /**
   * Fetches the full record when the search result lacks a synopsis or cover.
   * Falls back to the search result when the lookup fails.
   */
  private async completeEntry(client: CatalogClient, entry: CatalogEntry, signal?: AbortSignal): Promise<CatalogEntry> {
    if (!client.fetchEntry || (entry.synopsis && entry.imageUrl)) {
      return entry;
    }
    const fetchEntry = client.fetchEntry.bind(client);
    try {
      const full = await withDeadline(this.requestTimeoutMs, signal, (deadline) => fetchEntry(entry.id, deadline));
      return full ? { ...full, titles: full.titles.length > 0 ? full.titles : entry.titles } : entry;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn(`⚠ ${client.name} record ${entry.id} could not be fetched: ${describeError(error)}`);
      return entry;
    }
  }

  private unresolved(folderPath: string): FolderIdentity {
    return {
      folderPath,
      sourceId: '',
      catalog: '',
      romajiTitle: '',
      englishTitle: '',
      synopsis: '',
      imageFileName: '',
      imageUrl: '',
      resolvedAt: this.now()
    };
  }
}

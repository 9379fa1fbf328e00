import type { CatalogEntry } from '../../../shared/models';
import { TransientNetworkError, describeError } from '../../../shared/errors';
import { isRecord, readNumber, readRecord, readRecordArray, readString, readStringArray } from '../../../shared/guards';
import type { JsonRecord } from '../../../shared/guards';
import { toPlainText, uniqueTitles } from './CatalogClient';
import type { CatalogClient, FetchFunction } from './CatalogClient';

export const ANILIST_ENDPOINT = 'https://graphql.anilist.co';

const MEDIA_FIELDS = `
  id
  title { romaji english native }
  synonyms
  description(asHtml: false)
  coverImage { extraLarge large }
`;

const SEARCH_QUERY = `
query ($search: String, $perPage: Int) {
  Page(perPage: $perPage) {
    media(search: $search, type: ANIME) {${MEDIA_FIELDS}}
  }
}`;

const ENTRY_QUERY = `
query ($id: Int) {
  Media(id: $id, type: ANIME) {${MEDIA_FIELDS}}
}`;

export interface AniListCatalogOptions {
  fetch?: FetchFunction;
  endpoint?: string;
  /** Number of search results considered per query. */
  perPage?: number;
}

/**
 * Primary catalog backed by the AniList GraphQL API.
 */
export class AniListCatalog implements CatalogClient {
  public readonly name = 'anilist' as const;
  private readonly fetchFn: FetchFunction;
  private readonly endpoint: string;
  private readonly perPage: number;

  public constructor(options: AniListCatalogOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.endpoint = options.endpoint ?? ANILIST_ENDPOINT;
    this.perPage = options.perPage ?? 8;
  }

  /**
   * Searches anime by title and returns every candidate with its title variants.
   */
  public async searchTitles(term: string, signal?: AbortSignal): Promise<CatalogEntry[]> {
    const data = await this.query(SEARCH_QUERY, { search: term, perPage: this.perPage }, signal);
    return readRecordArray(readRecord(data, 'Page'), 'media').map((media) => this.mapMedia(media));
  }

  /**
   * Fetches one anime by numeric id.
   */
  public async fetchEntry(id: string, signal?: AbortSignal): Promise<CatalogEntry | null> {
    const numericId = Number.parseInt(id, 10);
    if (Number.isNaN(numericId)) {
      return null;
    }
    const data = await this.query(ENTRY_QUERY, { id: numericId }, signal);
    const media = data.Media;
    return isRecord(media) ? this.mapMedia(media) : null;
  }

  private async query(query: string, variables: JsonRecord, signal?: AbortSignal): Promise<JsonRecord> {
    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ query, variables }),
        signal
      });
    } catch (error) {
      throw new TransientNetworkError(`AniList request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransientNetworkError(`AniList returned ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransientNetworkError(`AniList sent an unreadable body: ${describeError(error)}`, { cause: error });
    }
    if (!isRecord(payload)) {
      throw new TransientNetworkError('AniList sent an unexpected body');
    }
    return readRecord(payload, 'data');
  }

  private mapMedia(media: JsonRecord): CatalogEntry {
    const title = readRecord(media, 'title');
    const cover = readRecord(media, 'coverImage');
    const romaji = readString(title, 'romaji');
    const english = readString(title, 'english');
    const native = readString(title, 'native');
    return {
      id: String(readNumber(media, 'id') ?? ''),
      titles: uniqueTitles([romaji, english, native, ...readStringArray(media, 'synonyms')]),
      romajiTitle: romaji,
      englishTitle: english,
      synopsis: toPlainText(readString(media, 'description')),
      imageUrl: readString(cover, 'extraLarge') || readString(cover, 'large')
    };
  }
}

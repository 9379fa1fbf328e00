import type { CatalogEntry } from '../../../shared/models';
import { TransientNetworkError, describeError } from '../../../shared/errors';
import { isRecord, readRecord, readRecordArray, readString, readStringArray } from '../../../shared/guards';
import type { JsonRecord } from '../../../shared/guards';
import { toPlainText, uniqueTitles } from './CatalogClient';
import type { CatalogClient, FetchFunction } from './CatalogClient';

export const TVDB_ENDPOINT = 'https://api4.thetvdb.com/v4';

export interface TvdbCatalogOptions {
  apiKey: string;
  fetch?: FetchFunction;
  endpoint?: string;
}

/**
 * Secondary catalog backed by TheTVDB v4 search. Contributes title variants and,
 * when it wins the comparison, a basic identity.
 */
export class TvdbCatalog implements CatalogClient {
  public readonly name = 'tvdb' as const;
  private readonly fetchFn: FetchFunction;
  private readonly endpoint: string;
  private token: string | null = null;

  public constructor(private readonly options: TvdbCatalogOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.endpoint = (options.endpoint ?? TVDB_ENDPOINT).replace(/\/+$/, '');
  }

  /**
   * Searches series by name. A rejected token is refreshed once.
   */
  public async searchTitles(term: string, signal?: AbortSignal): Promise<CatalogEntry[]> {
    const url = `${this.endpoint}/search?query=${encodeURIComponent(term)}&type=series`;
    let response = await this.get(url, signal);
    if (response.status === 401) {
      this.token = null;
      response = await this.get(url, signal);
    }
    if (!response.ok) {
      throw new TransientNetworkError(`TVDB search returned ${response.status}`);
    }
    const payload = await this.readJson(response);
    return readRecordArray(payload, 'data').map((item) => this.mapSeries(item));
  }

  private async get(url: string, signal?: AbortSignal): Promise<Response> {
    const token = await this.ensureToken(signal);
    try {
      return await this.fetchFn(url, {
        headers: { Authorization: `Bearer ${token}`, Accept: 'application/json' },
        signal
      });
    } catch (error) {
      throw new TransientNetworkError(`TVDB request failed: ${describeError(error)}`, { cause: error });
    }
  }

  private async ensureToken(signal?: AbortSignal): Promise<string> {
    if (this.token) {
      return this.token;
    }
    let response: Response;
    try {
      response = await this.fetchFn(`${this.endpoint}/login`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ apikey: this.options.apiKey }),
        signal
      });
    } catch (error) {
      throw new TransientNetworkError(`TVDB login failed: ${describeError(error)}`, { cause: error });
    }
    if (!response.ok) {
      throw new TransientNetworkError(`TVDB login returned ${response.status}`);
    }
    const token = readString(readRecord(await this.readJson(response), 'data'), 'token');
    if (!token) {
      throw new TransientNetworkError('TVDB login returned no token');
    }
    this.token = token;
    return token;
  }

  private async readJson(response: Response): Promise<JsonRecord> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransientNetworkError(`TVDB sent an unreadable body: ${describeError(error)}`, { cause: error });
    }
    return isRecord(payload) ? payload : {};
  }

  private mapSeries(item: JsonRecord): CatalogEntry {
    const name = readString(item, 'name');
    const translations = readRecord(item, 'translations');
    const overviews = readRecord(item, 'overviews');
    const translated = Object.values(translations).filter((value): value is string => typeof value === 'string');
    const english = readString(translations, 'eng');
    return {
      id: readString(item, 'tvdb_id') || readString(item, 'id'),
      titles: uniqueTitles([name, ...translated, ...readStringArray(item, 'aliases')]),
      romajiTitle: name,
      englishTitle: english || name,
      synopsis: toPlainText(readString(overviews, 'eng') || readString(item, 'overview')),
      imageUrl: readString(item, 'image_url')
    };
  }
}

import type { RemoteSession } from '../../shared/models';
import { TransientNetworkError, describeError } from '../../shared/errors';
import { isRecord, readNumber, readRecord, readRecordArray, readString } from '../../shared/guards';
import type { JsonRecord } from '../../shared/guards';
import type { FetchFunction } from './catalogs/CatalogClient';
import { withDeadline } from '../utils/deadline';

/**
 * Read-only view of the media server's current playback sessions.
 */
export interface RemoteSessionSource {
  getActiveSession(username: string, libraryNames: readonly string[], signal?: AbortSignal): Promise<RemoteSession | null>;
}

/**
 * Folders a library section reads from, as the server sees them.
 */
export interface LibraryLocation {
  library: string;
  paths: string[];
}

export interface PlexSessionSourceOptions {
  baseUrl: string;
  token: string;
  fetch?: FetchFunction;
  timeoutMs?: number;
}

/**
 * Queries a Plex Media Server over its HTTP API with JSON responses.
 */
export class PlexSessionSource implements RemoteSessionSource {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFunction;
  private readonly timeoutMs: number;

  public constructor(private readonly options: PlexSessionSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 6000;
  }

  /**
   * First session owned by `username` that plays from one of the given libraries.
   * Sessions from other users or libraries are skipped.
   */
  public async getActiveSession(
    username: string,
    libraryNames: readonly string[],
    signal?: AbortSignal
  ): Promise<RemoteSession | null> {
    const container = await this.get('/status/sessions', signal);
    for (const item of readRecordArray(container, 'Metadata')) {
      if (readString(readRecord(item, 'User'), 'title') !== username) {
        continue;
      }
      const libraryName = readString(item, 'librarySectionTitle');
      if (!libraryNames.includes(libraryName)) {
        continue;
      }
      const session = this.mapSession(item, libraryName);
      if (session) {
        return session;
      }
    }
    return null;
  }

  /**
   * Root folders of the named library sections.
   */
  public async listLibraryLocations(libraryNames: readonly string[], signal?: AbortSignal): Promise<LibraryLocation[]> {
    const container = await this.get('/library/sections', signal);
    return readRecordArray(container, 'Directory')
      .filter((directory) => libraryNames.includes(readString(directory, 'title')))
      .map((directory) => ({
        library: readString(directory, 'title'),
        paths: readRecordArray(directory, 'Location')
          .map((location) => readString(location, 'path'))
          .filter((locationPath) => locationPath.length > 0)
      }));
  }

  private mapSession(item: JsonRecord, libraryName: string): RemoteSession | null {
    const media = readRecordArray(item, 'Media')[0];
    const part = media ? readRecordArray(media, 'Part')[0] : undefined;
    const filePath = part ? readString(part, 'file') : '';
    if (!filePath) {
      return null;
    }
    const itemTitle = readString(item, 'title');
    const isEpisode = readString(item, 'type') === 'episode';
    return {
      libraryName,
      itemTitle,
      showTitle: (isEpisode && readString(item, 'grandparentTitle')) || itemTitle,
      filePath,
      isPlaying: readString(readRecord(item, 'Player'), 'state') !== 'paused',
      seasonNumber: isEpisode ? readNumber(item, 'parentIndex') : null,
      episodeNumber: isEpisode ? readNumber(item, 'index') : null,
      guid: readString(item, 'guid')
    };
  }

  private async get(endpoint: string, signal?: AbortSignal): Promise<JsonRecord> {
    return withDeadline(this.timeoutMs, signal, async (deadline) => {
      let response: Response;
      try {
        response = await this.fetchFn(`${this.baseUrl}${endpoint}`, {
          headers: { Accept: 'application/json', 'X-Plex-Token': this.options.token },
          signal: deadline
        });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        throw new TransientNetworkError(`Plex ${endpoint} failed: ${describeError(error)}`, { cause: error });
      }
      if (!response.ok) {
        throw new TransientNetworkError(`Plex ${endpoint} returned ${response.status}`);
      }
      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new TransientNetworkError(`Plex ${endpoint} sent an unreadable body`, { cause: error });
      }
      return isRecord(payload) ? readRecord(payload, 'MediaContainer') : {};
    });
  }
}

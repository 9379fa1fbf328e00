/**
 * Playback record reported by the media server for the configured user.
 */
export interface RemoteSession {
  /** Library section the played item belongs to. */
  libraryName: string;
  /** Title of the played item (episode or movie title). */
  itemTitle: string;
  /** Show title for episodes, otherwise the item title. */
  showTitle: string;
  /** File path as the server sees it. */
  filePath: string;
  /** False when the remote player reports a paused state. */
  isPlaying: boolean;
  /** Season number for episodes, null otherwise. */
  seasonNumber: number | null;
  /** Episode number for episodes, null otherwise. */
  episodeNumber: number | null;
  /** Server-side item guid, empty when not reported. */
  guid: string;
}

/**
 * Catalog that produced an identity, or empty for unresolved folders.
 */
export type CatalogName = 'anilist' | 'tvdb' | '';

/**
 * Cached, catalog-resolved metadata for one local media folder.
 */
export interface FolderIdentity {
  /** Normalized absolute folder path, unique across the cache. */
  folderPath: string;
  /** Catalog identifier; empty when the folder could not be resolved. */
  sourceId: string;
  catalog: CatalogName;
  romajiTitle: string;
  englishTitle: string;
  synopsis: string;
  /** File name inside the cover cache, empty when there is no cover. */
  imageFileName: string;
  /** Remote cover URL used to fill the cover cache. */
  imageUrl: string;
  /** Epoch milliseconds of the resolution. */
  resolvedAt: number;
}

/**
 * Single search result returned by a metadata catalog.
 */
export interface CatalogEntry {
  id: string;
  /** Every title variant the catalog knows (official, romaji, native, synonyms). */
  titles: string[];
  romajiTitle: string;
  englishTitle: string;
  synopsis: string;
  imageUrl: string;
}

/**
 * Lifecycle states of the owned player process.
 */
export type PlayerState = 'absent' | 'launching' | 'attached' | 'terminating';

/**
 * Result of a playback request against the player controller.
 */
export type PlaybackTransition = 'launched' | 'reloaded' | 'unchanged';

/**
 * The one player instance owned by the controller.
 */
export interface PlayerSession {
  pid: number;
  /** Socket path or pipe name of the player's control channel. */
  controlChannel: string;
  playingPath: string;
  /** Epoch milliseconds of the launch. */
  launchedAt: number;
}

/**
 * Display state published to the UI surface.
 */
export type NowPlayingState = 'idle' | 'playing' | 'paused' | 'unmatched';

/**
 * Snapshot consumed by the UI surface.
 */
export interface NowPlayingSnapshot {
  state: NowPlayingState;
  /** Resolved identity, null while idle or when nothing could be matched. */
  identity: FolderIdentity | null;
  /** Raw title reported by the server, used when no identity is available. */
  remoteTitle: string;
  isPlaying: boolean;
  /** Last cycle failure, cleared by the next successful cycle. */
  note: string | null;
}

/**
 * Remote to local root prefix pair.
 */
export interface PathMapping {
  remote: string;
  local: string;
}

/**
 * Validated application configuration.
 */
export interface AppSettings {
  plexUrl: string;
  plexToken: string;
  username: string;
  libraryNames: string[];
  playerPath: string;
  pollIntervalSeconds: number;
  tvdbApiKey: string | null;
  controlChannel: string;
  playerGeometry: string;
  playerArgs: string[];
  pathMappings: PathMapping[];
  matchThreshold: number;
  requestTimeoutMs: number;
  dataDir: string;
  logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

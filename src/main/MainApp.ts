import path from 'node:path';
import type { AppSettings, PathMapping } from '../shared/models';
import { describeError } from '../shared/errors';
import { ConsolePanel } from './ConsolePanel';
import { setLogLevel, logger } from './logger';
import { AniListCatalog } from './services/catalogs/AniListCatalog';
import { TvdbCatalog } from './services/catalogs/TvdbCatalog';
import type { FetchFunction } from './services/catalogs/CatalogClient';
import { CoverImageService } from './services/CoverImageService';
import { DatabaseService } from './services/DatabaseService';
import { IdentityCacheService } from './services/IdentityCacheService';
import { LibraryService } from './services/LibraryService';
import { MetadataResolver } from './services/MetadataResolver';
import { PathMapper } from './services/PathMapper';
import { PlexSessionSource } from './services/PlexSessionSource';
import { MpvIpcChannel } from './services/player/MpvIpcChannel';
import { MpvProcessLauncher } from './services/player/MpvProcessLauncher';
import { PlayerController } from './services/player/PlayerController';
import { SearchService } from './services/SearchService';
import { SettingsService } from './services/SettingsService';
import { SyncLoop } from './services/SyncLoop';
import { TitleMatcher } from './services/TitleMatcher';
import { NowPlayingStore } from './stores/NowPlayingStore';

export interface MainAppOptions {
  /** HTTP client for the media server; the global `fetch` by default. */
  fetch?: FetchFunction;
}

/**
 * Central application coordinator responsible for loading settings and wiring the services.
 */
export class MainApp {
  private settings: AppSettings | null = null;
  private database: DatabaseService | null = null;
  private cache: IdentityCacheService | null = null;
  private player: PlayerController | null = null;
  private panel: ConsolePanel | null = null;
  private loop: SyncLoop | null = null;
  private plex: PlexSessionSource | null = null;
  private library: LibraryService | null = null;

  public constructor(
    private readonly settingsService: SettingsService,
    private readonly options: MainAppOptions = {}
  ) {}

  /**
   * Loads settings and opens the identity cache. Throws ConfigurationError on bad settings.
   */
  public initialize(): void {
    const settings = this.settingsService.getSettings();
    this.settings = settings;
    setLogLevel(settings.logLevel);

    SettingsService.ensureDirectory(settings.dataDir);
    this.database = new DatabaseService(path.join(settings.dataDir, 'identities.db'));
    this.database.initialize();
    this.cache = new IdentityCacheService(this.database);
    logger.info(`Loaded ${this.cache.load()} cached folder identities`);
  }

  /**
   * Clears every cached identity. Returns the number removed.
   */
  public resetCache(): number {
    return this.requireCache().clear();
  }

  /**
   * Runs the sync loop until the signal aborts. With `once`, runs a single cycle and tears down.
   */
  public async run(signal: AbortSignal, once = false): Promise<void> {
    let loop: SyncLoop;
    try {
      loop = await this.createLoop(signal);
    } catch (error) {
      if (signal.aborted) {
        logger.info('■ Stopped before the sync loop started');
        return;
      }
      throw error;
    }
    this.panel?.start();
    if (once) {
      const outcome = await loop.runCycle(signal);
      logger.info(`Cycle finished: ${outcome}`);
      await loop.shutdown();
      return;
    }
    await loop.run(signal);
  }

  /**
   * Synchronous last-resort cleanup for the process exit hook.
   */
  public killPlayer(): void {
    this.player?.killNow();
  }

  /**
   * Gracefully releases resources during application shutdown.
   */
  public async dispose(): Promise<void> {
    await this.player?.stop();
    this.panel?.stop();
    this.database?.close();
  }

  private async createLoop(signal: AbortSignal): Promise<SyncLoop> {
    if (this.loop) {
      return this.loop;
    }
    const settings = this.requireSettings();
    const matcher = new TitleMatcher(settings.matchThreshold);
    const covers = new CoverImageService(path.join(settings.dataDir, 'covers'), {
      timeoutMs: settings.requestTimeoutMs
    });
    const store = new NowPlayingStore();

    this.plex = new PlexSessionSource({
      baseUrl: settings.plexUrl,
      token: settings.plexToken,
      fetch: this.options.fetch,
      timeoutMs: settings.requestTimeoutMs
    });
    this.library = new LibraryService(new SearchService(), matcher);
    const mappings = await this.resolvePathMappings(settings, signal);
    const paths = new PathMapper(mappings);
    this.library.setRoots(paths.localRoots);

    const resolver = new MetadataResolver({
      cache: this.requireCache(),
      matcher,
      primary: new AniListCatalog(),
      secondary: settings.tvdbApiKey ? new TvdbCatalog({ apiKey: settings.tvdbApiKey }) : null,
      requestTimeoutMs: settings.requestTimeoutMs
    });

    this.player = new PlayerController({
      launcher: new MpvProcessLauncher(settings.playerPath),
      connect: (address) => MpvIpcChannel.connect(address),
      channelAddress: settings.controlChannel,
      geometry: settings.playerGeometry,
      extraArgs: settings.playerArgs
    });

    this.panel = new ConsolePanel(store, covers);
    this.loop = new SyncLoop({
      sessions: this.plex,
      username: settings.username,
      libraryNames: settings.libraryNames,
      paths,
      resolver,
      player: this.player,
      store,
      library: this.library,
      covers,
      pollIntervalMs: settings.pollIntervalSeconds * 1000
    });
    return this.loop;
  }

  /**
   * Configured mappings win; otherwise the server's library folders map onto themselves.
   */
  private async resolvePathMappings(settings: AppSettings, signal: AbortSignal): Promise<PathMapping[]> {
    if (settings.pathMappings.length > 0) {
      return settings.pathMappings;
    }
    if (!this.plex) {
      return [];
    }
    try {
      const locations = await this.plex.listLibraryLocations(settings.libraryNames, signal);
      for (const location of locations) {
        logger.info(`Library '${location.library}' locations: ${location.paths.join(', ') || '(none)'}`);
      }
      const missing = settings.libraryNames.filter((name) => !locations.some((location) => location.library === name));
      if (missing.length > 0) {
        logger.warn(`⚠ Libraries not found on the server: ${missing.join(', ')}`);
      }
      return locations.flatMap((location) => location.paths.map((root) => ({ remote: root, local: root })));
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      logger.warn(`⚠ Could not read library locations, using server paths as-is: ${describeError(error)}`);
      return [];
    }
  }

  private requireSettings(): AppSettings {
    if (!this.settings) {
      throw new Error('MainApp has not been initialised.');
    }
    return this.settings;
  }

  private requireCache(): IdentityCacheService {
    if (!this.cache) {
      throw new Error('MainApp has not been initialised.');
    }
    return this.cache;
  }
}

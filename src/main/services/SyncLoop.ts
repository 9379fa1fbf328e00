import fs from 'node:fs/promises';
import type { FolderIdentity, NowPlayingSnapshot, RemoteSession } from '../../shared/models';
import { describeError } from '../../shared/errors';
import type { CoverImageService } from './CoverImageService';
import type { LibraryService } from './LibraryService';
import type { MetadataResolver } from './MetadataResolver';
import type { PathMapper } from './PathMapper';
import type { RemoteSessionSource } from './PlexSessionSource';
import type { PlayerController } from './player/PlayerController';
import { IDLE_SNAPSHOT } from '../stores/NowPlayingStore';
import type { NowPlayingStore } from '../stores/NowPlayingStore';
import { pause } from '../utils/deadline';
import { logger } from '../logger';

export type CycleOutcome = 'idle' | 'playing' | 'unmatched' | 'failed' | 'cancelled';

export interface SyncLoopOptions {
  sessions: RemoteSessionSource;
  username: string;
  libraryNames: readonly string[];
  paths: PathMapper;
  resolver: MetadataResolver;
  player: PlayerController;
  store: NowPlayingStore;
  /** Fallback used when the translated path does not exist locally. */
  library?: LibraryService | null;
  covers?: CoverImageService | null;
  pollIntervalMs: number;
  fileExists?: (filePath: string) => Promise<boolean>;
}

async function defaultFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Fixed-interval reconciliation: poll the server, map the played file to a local folder,
 * resolve its identity, publish it and make the local player follow.
 * Cycles run strictly one after another.
 */
export class SyncLoop {
  private readonly fileExists: (filePath: string) => Promise<boolean>;
  private readonly attemptedCovers = new Set<string>();
  private readonly detachExitListener: () => void;

  public constructor(private readonly options: SyncLoopOptions) {
    this.fileExists = options.fileExists ?? defaultFileExists;
    this.detachExitListener = options.player.onExit((code) => {
      logger.warn(`⚠ Player exited (code ${code ?? 'none'}); it is relaunched on the next cycle`);
    });
  }

  /**
   * Runs cycles until the signal aborts, then stops the player.
   */
  public async run(signal: AbortSignal): Promise<void> {
    logger.info('✔ Sync started');
    try {
      while (!signal.aborted) {
        await this.runCycle(signal);
        if (!(await pause(this.options.pollIntervalMs, signal))) {
          break;
        }
      }
    } finally {
      await this.shutdown();
    }
  }

  /**
   * One poll → match → drive iteration. Failures are logged and reported, never thrown.
   */
  public async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    try {
      const session = await this.options.sessions.getActiveSession(
        this.options.username,
        this.options.libraryNames,
        signal
      );
      if (!session) {
        return await this.goIdle();
      }
      return await this.follow(session, signal);
    } catch (error) {
      if (signal?.aborted) {
        return 'cancelled';
      }
      logger.error(`‼ Sync cycle failed: ${describeError(error)}`);
      this.publish({ ...this.options.store.getSnapshot(), note: describeError(error) });
      return 'failed';
    }
  }

  /**
   * Stops the player and publishes the idle state. Used on shutdown.
   */
  public async shutdown(): Promise<void> {
    this.detachExitListener();
    await this.options.player.stop();
    this.publish(IDLE_SNAPSHOT);
    logger.info('■ Sync stopped');
  }

  private async goIdle(): Promise<CycleOutcome> {
    if (this.options.player.getState() !== 'absent') {
      logger.info('■ Remote playback ended');
      await this.options.player.stop();
    }
    this.publish(IDLE_SNAPSHOT);
    return 'idle';
  }

  private async follow(session: RemoteSession, signal?: AbortSignal): Promise<CycleOutcome> {
    const localFile = await this.locateLocalFile(session);
    if (!localFile) {
      logger.warn(`⚠ No local file for "${session.showTitle}" (${session.filePath})`);
      await this.options.player.stop();
      this.publish({
        state: 'unmatched',
        identity: null,
        remoteTitle: session.showTitle,
        isPlaying: session.isPlaying,
        note: null
      });
      return 'unmatched';
    }

    const folder = this.options.paths.seriesFolder(localFile);
    const identity = await this.options.resolver.resolve(folder, { remoteTitle: session.showTitle, signal });
    const resolved = identity.sourceId !== '';
    this.publish({
      state: resolved ? (session.isPlaying ? 'playing' : 'paused') : 'unmatched',
      identity,
      remoteTitle: session.showTitle,
      isPlaying: session.isPlaying,
      note: null
    });

    const transition = await this.options.player.ensurePlaying(localFile, signal);
    if (transition !== 'unchanged') {
      logger.info(`Player ${transition}: ${localFile}`);
    }

    await this.fetchCover(identity, signal);
    return 'playing';
  }

  private async locateLocalFile(session: RemoteSession): Promise<string | null> {
    const mapped = this.options.paths.toLocal(session.filePath);
    if (mapped && (await this.fileExists(mapped))) {
      return mapped;
    }
    if (!this.options.library) {
      return null;
    }
    return this.options.library.locateEpisode(session);
  }

  /**
   * Downloads the cover once per process; failures are logged and not retried until restart.
   */
  private async fetchCover(identity: FolderIdentity, signal?: AbortSignal): Promise<void> {
    const covers = this.options.covers;
    if (!covers || !identity.imageFileName || this.attemptedCovers.has(identity.imageFileName)) {
      return;
    }
    this.attemptedCovers.add(identity.imageFileName);
    try {
      await covers.ensureCover(identity, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn(`⚠ Could not cache cover ${identity.imageFileName}: ${describeError(error)}`);
    }
  }

  private publish(snapshot: NowPlayingSnapshot): void {
    this.options.store.publish(snapshot);
  }
}

import type { NowPlayingSnapshot } from '../../shared/models';
import { describeError } from '../../shared/errors';
import { logger } from '../logger';

type NowPlayingListener = (snapshot: NowPlayingSnapshot) => void;

export const IDLE_SNAPSHOT: NowPlayingSnapshot = {
  state: 'idle',
  identity: null,
  remoteTitle: '',
  isPlaying: false,
  note: null
};

/**
 * Single-slot, latest-value-wins store between the sync loop and the display.
 * Publishing never waits on listeners; they are notified once per tick with whatever
 * snapshot is current by then, so intermediate snapshots may be skipped.
 */
export class NowPlayingStore {
  private snapshot: NowPlayingSnapshot = IDLE_SNAPSHOT;
  private notifyScheduled = false;
  private readonly listeners = new Set<NowPlayingListener>();

  /**
   * Retrieves the latest snapshot.
   */
  public getSnapshot(): NowPlayingSnapshot {
    return this.snapshot;
  }

  /**
   * Subscribes to updates.
   */
  public subscribe(listener: NowPlayingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public publish(snapshot: NowPlayingSnapshot): void {
    this.snapshot = snapshot;
    if (this.notifyScheduled) {
      return;
    }
    this.notifyScheduled = true;
    setImmediate(() => this.flush());
  }

  private flush(): void {
    this.notifyScheduled = false;
    const current = this.snapshot;
    for (const listener of this.listeners) {
      try {
        listener(current);
      } catch (error) {
        logger.warn(`Now-playing listener failed: ${describeError(error)}`);
      }
    }
  }
}

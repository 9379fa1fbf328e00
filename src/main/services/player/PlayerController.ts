import { EventEmitter } from 'node:events';
import { ControlChannelUnavailable, PlayerLaunchFailure, PlayerRequestRejected, describeError } from '../../../shared/errors';
import { PLAYER_COMMANDS } from '../../../shared/ipc';
import type { PlaybackTransition, PlayerSession, PlayerState } from '../../../shared/models';
import { pause } from '../../utils/deadline';
import { logger } from '../../logger';
import type { ChannelConnector, ControlChannel } from './MpvIpcChannel';
import type { PlayerLauncher, PlayerProcess } from './MpvProcessLauncher';

export interface PlayerControllerOptions {
  launcher: PlayerLauncher;
  connect: ChannelConnector;
  /** Socket path or pipe name the player binds its control channel to. */
  channelAddress: string;
  /** mpv `--geometry` value; a tiny fixed corner window by default. */
  geometry?: string;
  extraArgs?: string[];
  connectAttempts?: number;
  connectBackoffMs?: number;
  commandTimeoutMs?: number;
  stopTimeoutMs?: number;
  now?: () => number;
}

/**
 * Owns at most one player process and its control channel.
 *
 * States: absent → launching → attached → terminating → absent. Re-requesting the file
 * that is already playing only asks the player which file it has open; a different file is
 * loaded over the channel instead of relaunching. Emits `exit` when the owned process dies
 * on its own.
 */
export class PlayerController {
  private state: PlayerState = 'absent';
  private process: PlayerProcess | null = null;
  private channel: ControlChannel | null = null;
  private session: PlayerSession | null = null;
  private readonly events = new EventEmitter();

  private readonly connectAttempts: number;
  private readonly connectBackoffMs: number;
  private readonly commandTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly now: () => number;

  public constructor(private readonly options: PlayerControllerOptions) {
    this.connectAttempts = options.connectAttempts ?? 10;
    this.connectBackoffMs = options.connectBackoffMs ?? 200;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 2000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 3000;
    this.now = options.now ?? Date.now;
  }

  public getState(): PlayerState {
    return this.state;
  }

  /**
   * Snapshot of the owned session, or null when no player is attached.
   */
  public getSession(): PlayerSession | null {
    return this.session ? { ...this.session } : null;
  }

  /**
   * Registers a listener for unexpected process exits. Returns an unsubscribe function.
   */
  public onExit(listener: (code: number | null) => void): () => void {
    this.events.on('exit', listener);
    return () => this.events.off('exit', listener);
  }

  /**
   * Makes the player show `filePath`, launching, reloading or doing nothing as needed.
   */
  public async ensurePlaying(filePath: string, signal?: AbortSignal): Promise<PlaybackTransition> {
    if (this.state === 'launching' || this.state === 'terminating') {
      throw new ControlChannelUnavailable(`Player is ${this.state}`);
    }

    if (this.state === 'attached') {
      if (!this.isHealthy()) {
        logger.warn('⚠ Player process or control channel went away, relaunching');
        await this.terminate(false);
      } else if (this.session?.playingPath !== filePath) {
        await this.load(filePath);
        return 'reloaded';
      } else {
        const transition = await this.confirmPlaying(filePath);
        if (transition) {
          return transition;
        }
      }
    }

    await this.launch(filePath, signal);
    return 'launched';
  }

  /**
   * Asks the player which file it currently has open. Null when nothing is loaded.
   */
  public async getStatus(): Promise<string | null> {
    if (this.state !== 'attached' || !this.channel) {
      return null;
    }
    try {
      const data = await this.channel.request([PLAYER_COMMANDS.getProperty, 'path'], this.commandTimeoutMs);
      return typeof data === 'string' ? data : null;
    } catch (error) {
      // An idle player has no `path` property.
      if (error instanceof PlayerRequestRejected) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Quits the player and releases the channel. Safe to call in any state.
   */
  public async stop(): Promise<void> {
    if (this.state === 'absent' || this.state === 'terminating') {
      return;
    }
    logger.info('■ Stopping player');
    await this.terminate(true);
  }

  /**
   * Synchronous last-resort kill for process exit hooks.
   */
  public killNow(): void {
    const owned = this.process;
    this.release();
    owned?.kill();
  }

  /**
   * Checks that the player still has `filePath` open. An idle player or one showing another
   * file gets the file loaded again; a player that does not answer is torn down, and null
   * tells the caller to relaunch.
   */
  private async confirmPlaying(filePath: string): Promise<PlaybackTransition | null> {
    let reported: string | null;
    try {
      reported = await this.getStatus();
    } catch (error) {
      logger.warn(`⚠ Player did not answer a status query (${describeError(error)}), relaunching`);
      await this.terminate(false);
      return null;
    }
    if (reported === filePath) {
      return 'unchanged';
    }
    logger.warn(`⚠ Player reports ${reported ?? 'nothing'} instead of ${filePath}, reloading`);
    await this.load(filePath);
    return 'reloaded';
  }

  private isHealthy(): boolean {
    return this.process !== null && !this.process.exited && this.channel !== null && !this.channel.closed;
  }

  private buildArgs(filePath: string): string[] {
    return [
      `--input-ipc-server=${this.options.channelAddress}`,
      '--mute=yes',
      '--osc=no',
      '--no-sub',
      '--force-window=yes',
      `--geometry=${this.options.geometry ?? '1x1+0+0'}`,
      '--idle=yes',
      ...(this.options.extraArgs ?? []),
      '--',
      filePath
    ];
  }

  private async launch(filePath: string, signal?: AbortSignal): Promise<void> {
    this.state = 'launching';
    logger.info(`▶ Launching player: ${filePath}`);

    let launched: PlayerProcess;
    try {
      launched = await this.options.launcher.launch(this.buildArgs(filePath));
    } catch (error) {
      this.state = 'absent';
      throw error instanceof PlayerLaunchFailure
        ? error
        : new PlayerLaunchFailure(`Player launch failed: ${describeError(error)}`, { cause: error });
    }

    this.process = launched;
    launched.onExit((code) => this.handleExit(launched, code));

    try {
      this.channel = await this.connectWithRetry(launched, signal);
    } catch (error) {
      await this.terminate(false);
      throw error;
    }

    this.session = {
      pid: launched.pid,
      controlChannel: this.options.channelAddress,
      playingPath: filePath,
      launchedAt: this.now()
    };
    this.state = 'attached';
  }

  private async connectWithRetry(launched: PlayerProcess, signal?: AbortSignal): Promise<ControlChannel> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.connectAttempts; attempt += 1) {
      if (launched.exited) {
        throw new PlayerLaunchFailure('Player exited before its control channel came up');
      }
      try {
        return await this.options.connect(this.options.channelAddress);
      } catch (error) {
        lastError = error;
      }
      if (attempt < this.connectAttempts && !(await pause(this.connectBackoffMs, signal))) {
        throw new ControlChannelUnavailable('Shutdown requested while waiting for the control channel');
      }
    }
    throw new ControlChannelUnavailable(
      `Control channel ${this.options.channelAddress} unavailable after ${this.connectAttempts} attempts: ${describeError(lastError)}`,
      { cause: lastError }
    );
  }

  private async load(filePath: string): Promise<void> {
    const channel = this.channel;
    const session = this.session;
    if (!channel || !session) {
      throw new ControlChannelUnavailable('No control channel attached');
    }
    logger.info(`▶ Loading into running player: ${filePath}`);
    try {
      await channel.request([PLAYER_COMMANDS.loadFile, filePath, 'replace'], this.commandTimeoutMs);
    } catch (error) {
      await this.terminate(false);
      throw error instanceof ControlChannelUnavailable
        ? error
        : new ControlChannelUnavailable(`Load command failed: ${describeError(error)}`, { cause: error });
    }
    this.session = { ...session, playingPath: filePath };
  }

  /**
   * Moves to absent. A graceful stop asks the player to quit before killing it.
   */
  private async terminate(graceful: boolean): Promise<void> {
    this.state = 'terminating';
    const owned = this.process;
    const channel = this.channel;

    if (graceful && channel && !channel.closed) {
      try {
        await channel.request([PLAYER_COMMANDS.quit], this.commandTimeoutMs);
      } catch (error) {
        logger.debug(`Quit command not acknowledged: ${describeError(error)}`);
      }
    }

    if (owned && !owned.exited) {
      const exited = graceful && (await owned.waitForExit(this.stopTimeoutMs));
      if (!exited) {
        owned.kill();
        if (!(await owned.waitForExit(this.stopTimeoutMs))) {
          logger.warn(`⚠ Player process ${owned.pid} did not exit after being killed`);
        }
      }
    }

    this.release();
  }

  private release(): void {
    this.channel?.close();
    this.channel = null;
    this.process = null;
    this.session = null;
    this.state = 'absent';
  }

  private handleExit(exitedProcess: PlayerProcess, code: number | null): void {
    // During launch the connect loop notices the exit and cleans up itself.
    if (exitedProcess !== this.process || this.state !== 'attached') {
      return;
    }
    logger.warn(`⚠ Player exited unexpectedly (code ${code ?? 'none'})`);
    this.release();
    this.events.emit('exit', code);
  }
}

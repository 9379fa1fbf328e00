import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { PlayerLaunchFailure } from '../../../shared/errors';

/**
 * Handle on a launched player process.
 */
export interface PlayerProcess {
  readonly pid: number;
  readonly exited: boolean;
  onExit(listener: (code: number | null) => void): void;
  /** Sends SIGTERM (or the platform equivalent). */
  kill(): void;
  /** Resolves true once the process has exited, false when the timeout elapses first. */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export interface PlayerLauncher {
  launch(args: string[]): Promise<PlayerProcess>;
}

class ChildPlayerProcess implements PlayerProcess {
  private hasExited = false;
  private readonly listeners: Array<(code: number | null) => void> = [];

  public constructor(private readonly child: ChildProcess, public readonly pid: number) {
    child.once('exit', (code) => {
      this.hasExited = true;
      for (const listener of this.listeners) {
        listener(code);
      }
    });
  }

  public get exited(): boolean {
    return this.hasExited;
  }

  public onExit(listener: (code: number | null) => void): void {
    this.listeners.push(listener);
  }

  public kill(): void {
    if (!this.hasExited) {
      this.child.kill();
    }
  }

  public waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.hasExited) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      this.onExit(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}

/**
 * Starts mpv as a detached-from-stdio child of this process.
 */
export class MpvProcessLauncher implements PlayerLauncher {
  public constructor(private readonly playerPath: string) {}

  public launch(args: string[]): Promise<PlayerProcess> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.playerPath, args, { stdio: 'ignore', windowsHide: false });
      child.once('error', (error) => {
        reject(new PlayerLaunchFailure(`Could not start ${this.playerPath}: ${error.message}`, { cause: error }));
      });
      child.once('spawn', () => {
        if (child.pid === undefined) {
          reject(new PlayerLaunchFailure(`${this.playerPath} started without a pid`));
          return;
        }
        resolve(new ChildPlayerProcess(child, child.pid));
      });
    });
  }
}

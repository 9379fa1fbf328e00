import net from 'node:net';
import { ControlChannelUnavailable, PlayerRequestRejected } from '../../../shared/errors';
import { isPlayerResponse } from '../../../shared/ipc';
import type { PlayerRequest } from '../../../shared/ipc';

/**
 * Request/response channel to a running player.
 */
export interface ControlChannel {
  readonly closed: boolean;
  /** Sends a command and resolves with the reply's `data` field. */
  request(command: PlayerRequest['command'], timeoutMs?: number): Promise<unknown>;
  close(): void;
}

export type ChannelConnector = (address: string) => Promise<ControlChannel>;

interface PendingRequest {
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * mpv JSON IPC over a Unix domain socket or Windows named pipe.
 * Requests are newline-delimited JSON matched to replies by `request_id`; event lines are ignored.
 */
export class MpvIpcChannel implements ControlChannel {
  private readonly pending = new Map<number, PendingRequest>();
  private buffer = '';
  private nextRequestId = 1;
  private isClosed = false;

  private constructor(private readonly socket: net.Socket, private readonly defaultTimeoutMs: number) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('close', () => this.handleClose());
    socket.on('error', () => this.handleClose());
  }

  /**
   * Opens the channel, rejecting with {@link ControlChannelUnavailable} when nobody listens yet.
   */
  public static connect(address: string, defaultTimeoutMs = 2000): Promise<MpvIpcChannel> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(address);
      const onError = (error: Error): void => {
        socket.destroy();
        reject(new ControlChannelUnavailable(`Cannot open control channel ${address}: ${error.message}`, { cause: error }));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new MpvIpcChannel(socket, defaultTimeoutMs));
      });
    });
  }

  public get closed(): boolean {
    return this.isClosed;
  }

  public request(command: PlayerRequest['command'], timeoutMs = this.defaultTimeoutMs): Promise<unknown> {
    if (this.isClosed) {
      return Promise.reject(new ControlChannelUnavailable('Control channel is closed'));
    }
    const requestId = this.nextRequestId++;
    const payload: PlayerRequest = { command, request_id: requestId };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new ControlChannelUnavailable(`No reply to "${command[0]}" within ${timeoutMs}ms`));
      }, timeoutMs);
      this.pending.set(requestId, { resolve, reject, timer });
      this.socket.write(`${JSON.stringify(payload)}\n`);
    });
  }

  public close(): void {
    if (!this.isClosed) {
      this.socket.end();
      this.socket.destroy();
    }
    this.handleClose();
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline >= 0) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (line.length > 0) {
        this.handleLine(line);
      }
      newline = this.buffer.indexOf('\n');
    }
  }

  private handleLine(line: string): void {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      return;
    }
    if (!isPlayerResponse(message)) {
      return;
    }
    const pending = this.pending.get(message.request_id);
    if (!pending) {
      return;
    }
    this.pending.delete(message.request_id);
    clearTimeout(pending.timer);
    if (message.error === 'success') {
      pending.resolve(message.data ?? null);
    } else {
      pending.reject(new PlayerRequestRejected(`Player rejected request ${message.request_id}: ${message.error}`));
    }
  }

  private handleClose(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    for (const [requestId, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new ControlChannelUnavailable(`Control channel closed before reply to request ${requestId}`));
    }
    this.pending.clear();
  }
}

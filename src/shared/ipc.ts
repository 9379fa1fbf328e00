import { isRecord } from './guards';

/** Enumerates the mpv JSON IPC commands the player controller sends. */
export const PLAYER_COMMANDS = {
  loadFile: 'loadfile',
  getProperty: 'get_property',
  quit: 'quit'
} as const;

export type PlayerCommandName = (typeof PLAYER_COMMANDS)[keyof typeof PLAYER_COMMANDS];

/**
 * One command as written to the control channel.
 */
export interface PlayerRequest {
  command: [PlayerCommandName, ...Array<string | number | boolean>];
  request_id: number;
}

/**
 * Reply line matched to a request by its id.
 */
export interface PlayerResponse {
  request_id: number;
  /** 'success' or an mpv error string. */
  error: string;
  data?: unknown;
}

/**
 * Narrows a parsed IPC line to a reply. Event lines carry no request id and are skipped.
 */
export function isPlayerResponse(value: unknown): value is PlayerResponse {
  return isRecord(value) && typeof value.request_id === 'number' && typeof value.error === 'string';
}

/**
 * Builds the platform-specific address for a control channel name.
 * Names that already look like a path or pipe are used as-is.
 */
export function resolveChannelAddress(name: string, platform: NodeJS.Platform, tmpDir: string): string {
  if (name.startsWith('\\\\.\\pipe\\') || name.includes('/')) {
    return name;
  }
  if (platform === 'win32') {
    return `\\\\.\\pipe\\${name}`;
  }
  return `${tmpDir.replace(/\/+$/, '')}/${name}.sock`;
}

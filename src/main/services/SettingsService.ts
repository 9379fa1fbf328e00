import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { AppSettings, LogLevel, PathMapping } from '../../shared/models';
import { ConfigurationError, describeError } from '../../shared/errors';
import { isRecord } from '../../shared/guards';
import type { JsonRecord } from '../../shared/guards';
import { resolveChannelAddress } from '../../shared/ipc';
import { DEFAULT_MATCH_THRESHOLD } from './TitleMatcher';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_CHANNEL_NAME = 'plex-player-sync';

/**
 * Loads and validates the JSON configuration file.
 */
export class SettingsService {
  private settings: AppSettings | null = null;

  public constructor(
    private readonly configPath: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Reads the current settings snapshot, loading it on first access.
   */
  public getSettings(): AppSettings {
    this.settings ??= this.load();
    return this.settings;
  }

  /**
   * Reads the file and validates every field. All problems are reported in one
   * {@link ConfigurationError}.
   */
  public load(): AppSettings {
    const absolute = path.resolve(this.configPath);
    if (!fs.existsSync(absolute)) {
      throw new ConfigurationError([
        `config file not found: ${absolute} (copy config.example.json to config.json and fill in your values)`
      ]);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(absolute, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError([`config file is not valid JSON: ${describeError(error)}`]);
    }
    this.settings = SettingsService.validate(raw, path.dirname(absolute), this.env);
    return this.settings;
  }

  /**
   * Turns parsed JSON into settings. Relative directories resolve against `baseDir`.
   * `PLEX_TOKEN` in the environment overrides the file's token.
   */
  public static validate(input: unknown, baseDir: string, env: NodeJS.ProcessEnv = {}): AppSettings {
    if (!isRecord(input)) {
      throw new ConfigurationError(['config file must contain a JSON object']);
    }
    const raw: JsonRecord = input;
    const problems: string[] = [];

    const requiredString = (key: string, override?: string): string => {
      const value = override ?? raw[key];
      if (typeof value !== 'string' || value.trim().length === 0) {
        problems.push(`${key} is required`);
        return '';
      }
      return value.trim();
    };
    const optionalNumber = (key: string, fallback: number, valid: (value: number) => boolean): number => {
      const value = raw[key];
      if (value === undefined || value === null) {
        return fallback;
      }
      if (typeof value !== 'number' || !valid(value)) {
        problems.push(`${key} has an invalid value`);
        return fallback;
      }
      return value;
    };

    const plexUrl = requiredString('plexUrl');
    if (plexUrl && !/^https?:\/\//i.test(plexUrl)) {
      problems.push('plexUrl must start with http:// or https://');
    }
    const plexToken = requiredString('plexToken', env.PLEX_TOKEN?.trim() || undefined);
    const username = requiredString('username');
    const playerPath = requiredString('playerPath');

    const libraryNames = SettingsService.stringList(raw, 'libraryNames');
    if (!libraryNames || libraryNames.length === 0) {
      problems.push('libraryNames must be a non-empty list of library names');
    }

    const playerArgs = raw.playerArgs === undefined ? [] : SettingsService.stringList(raw, 'playerArgs');
    if (!playerArgs) {
      problems.push('playerArgs must be a list of strings');
    }

    const pathMappings = SettingsService.pathMappings(raw.pathMappings, problems);

    const logLevel = raw.logLevel === undefined ? 'info' : LOG_LEVELS.find((level) => level === raw.logLevel);
    if (!logLevel) {
      problems.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }

    const pollIntervalSeconds = optionalNumber('pollIntervalSeconds', 3, (value) => value > 0);
    const matchThreshold = optionalNumber('matchThreshold', DEFAULT_MATCH_THRESHOLD, (value) => value > 0 && value <= 1);
    const requestTimeoutMs = optionalNumber('requestTimeoutMs', 6000, (value) => Number.isInteger(value) && value > 0);

    const optionalString = (key: string): string | null => {
      const value = raw[key];
      if (value === undefined || value === null || value === '') {
        return null;
      }
      if (typeof value !== 'string') {
        problems.push(`${key} must be a string`);
        return null;
      }
      return value.trim() || null;
    };
    const tvdbApiKey = optionalString('tvdbApiKey');
    const channelName = optionalString('controlChannel') ?? DEFAULT_CHANNEL_NAME;
    const playerGeometry = optionalString('playerGeometry') ?? '1x1+0+0';
    const dataDir = optionalString('dataDir') ?? 'data';

    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }

    return {
      plexUrl,
      plexToken,
      username,
      libraryNames: libraryNames ?? [],
      playerPath,
      pollIntervalSeconds,
      tvdbApiKey,
      controlChannel: resolveChannelAddress(channelName, process.platform, os.tmpdir()),
      playerGeometry,
      playerArgs: playerArgs ?? [],
      pathMappings,
      matchThreshold,
      requestTimeoutMs,
      dataDir: path.resolve(baseDir, dataDir),
      logLevel: logLevel ?? 'info'
    };
  }

  /**
   * Guarantees that the desired directory exists.
   */
  public static ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  private static stringList(raw: JsonRecord, key: string): string[] | null {
    const value = raw[key];
    if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'string')) {
      return null;
    }
    return value.map((entry: string) => entry.trim()).filter((entry) => entry.length > 0);
  }

  private static pathMappings(value: unknown, problems: string[]): PathMapping[] {
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      problems.push('pathMappings must be a list of { "remote": ..., "local": ... } objects');
      return [];
    }
    const mappings: PathMapping[] = [];
    value.forEach((entry: unknown, index) => {
      if (
        isRecord(entry) &&
        typeof entry.remote === 'string' &&
        typeof entry.local === 'string' &&
        entry.remote.trim() &&
        entry.local.trim()
      ) {
        mappings.push({ remote: entry.remote.trim(), local: entry.local.trim() });
      } else {
        problems.push(`pathMappings[${index}] needs non-empty "remote" and "local" strings`);
      }
    });
    return mappings;
  }
}

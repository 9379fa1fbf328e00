/**
 * Test suite for SettingsService.
 * Run with: node --import tsx --test src/test/SettingsService.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '../shared/errors';
import { resolveChannelAddress } from '../shared/ipc';
import { DEFAULT_CHANNEL_NAME, SettingsService } from '../main/services/SettingsService';
import { cleanupDirectory, getTempLibraryPath } from './testHelpers';

const minimal = {
  plexUrl: 'http://plex.example.test:32400',
  plexToken: 'test-token',
  username: 'viewer',
  libraryNames: ['Anime'],
  playerPath: 'mpv'
};

function problemsOf(task: () => unknown): string[] {
  try {
    task();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  assert.fail('expected a ConfigurationError');
}

describe('SettingsService', () => {
  describe('validate', () => {
    it('should apply defaults', () => {
      assert.deepStrictEqual(SettingsService.validate(minimal, '/etc/sync'), {
        plexUrl: 'http://plex.example.test:32400',
        plexToken: 'test-token',
        username: 'viewer',
        libraryNames: ['Anime'],
        playerPath: 'mpv',
        pollIntervalSeconds: 3,
        tvdbApiKey: null,
        controlChannel: resolveChannelAddress(DEFAULT_CHANNEL_NAME, process.platform, os.tmpdir()),
        playerGeometry: '1x1+0+0',
        playerArgs: [],
        pathMappings: [],
        matchThreshold: 0.6,
        requestTimeoutMs: 6000,
        dataDir: path.resolve('/etc/sync', 'data'),
        logLevel: 'info'
      });
    });

    it('should read optional settings', () => {
      const settings = SettingsService.validate(
        {
          ...minimal,
          pollIntervalSeconds: 5,
          tvdbApiKey: 'test-secret',
          playerArgs: ['--volume=0'],
          pathMappings: [{ remote: '/data/anime', local: '/mnt/anime' }],
          matchThreshold: 0.8,
          logLevel: 'debug'
        },
        '/etc/sync'
      );
      assert.strictEqual(settings.pollIntervalSeconds, 5);
      assert.strictEqual(settings.tvdbApiKey, 'test-secret');
      assert.deepStrictEqual(settings.playerArgs, ['--volume=0']);
      assert.deepStrictEqual(settings.pathMappings, [{ remote: '/data/anime', local: '/mnt/anime' }]);
      assert.strictEqual(settings.matchThreshold, 0.8);
      assert.strictEqual(settings.logLevel, 'debug');
    });

    it('should let the environment provide the token', () => {
      const { plexToken: _unused, ...withoutToken } = minimal;
      const settings = SettingsService.validate(withoutToken, '/etc/sync', { PLEX_TOKEN: 'env-token' });
      assert.strictEqual(settings.plexToken, 'env-token');
    });

    it('should report every problem at once', () => {
      const problems = problemsOf(() =>
        SettingsService.validate(
          {
            plexUrl: 'ftp://plex.example.test',
            libraryNames: [],
            logLevel: 'loud',
            pollIntervalSeconds: 0,
            pathMappings: [{ remote: '/data/anime' }]
          },
          '/etc/sync'
        )
      );
      assert.deepStrictEqual(problems, [
        'plexUrl must start with http:// or https://',
        'plexToken is required',
        'username is required',
        'playerPath is required',
        'libraryNames must be a non-empty list of library names',
        'pathMappings[0] needs non-empty "remote" and "local" strings',
        'logLevel must be one of debug, info, warn, error',
        'pollIntervalSeconds has an invalid value'
      ]);
    });

    it('should reject a non-object document', () => {
      assert.deepStrictEqual(problemsOf(() => SettingsService.validate([1, 2], '/etc/sync')), [
        'config file must contain a JSON object'
      ]);
    });

    it('should reject thresholds outside (0, 1]', () => {
      assert.deepStrictEqual(problemsOf(() => SettingsService.validate({ ...minimal, matchThreshold: 1.5 }, '/etc/sync')), [
        'matchThreshold has an invalid value'
      ]);
    });
  });

  describe('load', () => {
    let directory: string;

    beforeEach(async () => {
      directory = getTempLibraryPath();
      await fs.mkdir(directory, { recursive: true });
    });

    afterEach(async () => {
      await cleanupDirectory(directory);
    });

    it('should resolve the data directory next to the file', async () => {
      const configPath = path.join(directory, 'config.json');
      await fs.writeFile(configPath, JSON.stringify({ ...minimal, dataDir: 'state' }));

      const service = new SettingsService(configPath, {});
      assert.strictEqual(service.getSettings().dataDir, path.join(directory, 'state'));
      assert.strictEqual(service.getSettings(), service.getSettings());
    });

    it('should explain a missing file', () => {
      const service = new SettingsService(path.join(directory, 'missing.json'), {});
      assert.throws(() => service.getSettings(), /config file not found/);
    });

    it('should explain invalid JSON', async () => {
      const configPath = path.join(directory, 'config.json');
      await fs.writeFile(configPath, '{ not json');
      assert.throws(() => new SettingsService(configPath, {}).load(), /config file is not valid JSON/);
    });
  });
});

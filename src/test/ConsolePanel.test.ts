/**
 * Test suite for the console now-playing panel.
 * Run with: node --import tsx --test src/test/ConsolePanel.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';
import type { NowPlayingSnapshot } from '../shared/models';
import { ConsolePanel, renderSnapshot, trimSynopsis } from '../main/ConsolePanel';
import { CoverImageService } from '../main/services/CoverImageService';
import { IDLE_SNAPSHOT, NowPlayingStore } from '../main/stores/NowPlayingStore';
import { makeIdentity } from './testHelpers';

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('ConsolePanel', () => {
  const playing: NowPlayingSnapshot = {
    state: 'playing',
    identity: makeIdentity({
      romajiTitle: 'Shingeki no Kyojin',
      englishTitle: 'Attack on Titan',
      synopsis: 'Line one.\nLine two.'
    }),
    remoteTitle: 'Attack on Titan',
    isPlaying: true,
    note: null
  };

  describe('trimSynopsis', () => {
    it('should keep short text', () => {
      assert.strictEqual(trimSynopsis('short', 8), 'short');
    });

    it('should cut at a word boundary', () => {
      assert.strictEqual(trimSynopsis('one two three', 8), 'one two…');
    });

    it('should cut long words hard', () => {
      assert.strictEqual(trimSynopsis('abcdefghij', 4), 'abcd…');
    });
  });

  describe('renderSnapshot', () => {
    it('should render idle', () => {
      assert.deepStrictEqual(renderSnapshot(IDLE_SNAPSHOT), ['● Status: Idle']);
    });

    it('should render a resolved identity', () => {
      assert.deepStrictEqual(renderSnapshot(playing, '/covers/anilist_101.jpg'), [
        '● Status: Playing',
        '  Shingeki no Kyojin',
        '  Attack on Titan',
        '',
        '  Line one.',
        '  Line two.',
        '',
        '  Cover: /covers/anilist_101.jpg'
      ]);
    });

    it('should fall back to the remote title and show notes', () => {
      const snapshot: NowPlayingSnapshot = {
        state: 'unmatched',
        identity: makeIdentity({ sourceId: '', romajiTitle: '', englishTitle: '' }),
        remoteTitle: 'Some Show',
        isPlaying: true,
        note: 'Plex /status/sessions returned 500'
      };
      assert.deepStrictEqual(renderSnapshot(snapshot), [
        '● Status: Unmatched',
        '  Some Show',
        '  ⚠ Plex /status/sessions returned 500'
      ]);
    });
  });

  it('should print each distinct snapshot once', async () => {
    const store = new NowPlayingStore();
    const written: string[] = [];
    const panel = new ConsolePanel(store, new CoverImageService('/covers'), (text) => written.push(text));
    panel.start();

    store.publish(playing);
    await nextTick();
    store.publish({ ...playing });
    await nextTick();
    panel.stop();
    store.publish(IDLE_SNAPSHOT);
    await nextTick();

    assert.strictEqual(written.length, 1);
    assert.strictEqual(written[0].split('\n').at(-1), `  Cover: ${path.join('/covers', 'anilist_101.jpg')}`);
  });
});

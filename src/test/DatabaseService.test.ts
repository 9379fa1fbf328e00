/**
 * Test suite for DatabaseService.
 * Run with: node --import tsx --test src/test/DatabaseService.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import Database from 'better-sqlite3';
import fs from 'node:fs/promises';
import { DatabaseService } from '../main/services/DatabaseService';
import { getTempDbPath, makeIdentity } from './testHelpers';

describe('DatabaseService', () => {
  let database: DatabaseService;
  let dbPath: string;

  beforeEach(() => {
    dbPath = getTempDbPath();
    database = new DatabaseService(dbPath);
    database.initialize();
  });

  afterEach(async () => {
    database.close();
    await fs.rm(dbPath, { force: true });
    await fs.rm(`${dbPath}-wal`, { force: true });
    await fs.rm(`${dbPath}-shm`, { force: true });
  });

  describe('identities', () => {
    it('should upsert and read back an identity', () => {
      const stored = database.upsertIdentity(makeIdentity());
      assert.deepStrictEqual(stored, makeIdentity());
      assert.deepStrictEqual(database.getIdentity('/library/Sample Show'), makeIdentity());
    });

    it('should replace the existing row for the same folder', () => {
      database.upsertIdentity(makeIdentity());
      database.upsertIdentity(makeIdentity({ sourceId: '202', catalog: 'tvdb', resolvedAt: 2000 }));

      const all = database.listIdentities();
      assert.strictEqual(all.length, 1);
      assert.strictEqual(all[0].sourceId, '202');
      assert.strictEqual(all[0].catalog, 'tvdb');
      assert.strictEqual(all[0].resolvedAt, 2000);
    });

    it('should store unresolved identities with empty fields', () => {
      const unresolved = makeIdentity({
        sourceId: '',
        catalog: '',
        romajiTitle: '',
        englishTitle: '',
        synopsis: '',
        imageFileName: '',
        imageUrl: ''
      });
      assert.deepStrictEqual(database.upsertIdentity(unresolved), unresolved);
    });

    it('should list identities ordered by folder path', () => {
      database.upsertIdentity(makeIdentity({ folderPath: '/library/b' }));
      database.upsertIdentity(makeIdentity({ folderPath: '/library/a' }));
      assert.deepStrictEqual(
        database.listIdentities().map((identity) => identity.folderPath),
        ['/library/a', '/library/b']
      );
    });

    it('should return null for unknown folders', () => {
      assert.strictEqual(database.getIdentity('/library/missing'), null);
    });

    it('should delete one identity', () => {
      database.upsertIdentity(makeIdentity());
      assert.strictEqual(database.deleteIdentity('/library/Sample Show'), true);
      assert.strictEqual(database.deleteIdentity('/library/Sample Show'), false);
    });

    it('should clear every identity', () => {
      database.upsertIdentity(makeIdentity({ folderPath: '/library/a' }));
      database.upsertIdentity(makeIdentity({ folderPath: '/library/b' }));
      assert.strictEqual(database.clearIdentities(), 2);
      assert.deepStrictEqual(database.listIdentities(), []);
    });
  });

  describe('schema', () => {
    it('should add columns missing from older databases', () => {
      database.close();
      const legacy = new Database(dbPath);
      legacy.exec('DROP TABLE folder_identities');
      legacy.exec(`
        CREATE TABLE folder_identities (
          folder_path TEXT PRIMARY KEY,
          source_id TEXT NOT NULL DEFAULT '',
          romaji_title TEXT NOT NULL DEFAULT '',
          english_title TEXT NOT NULL DEFAULT '',
          synopsis TEXT NOT NULL DEFAULT '',
          image_file_name TEXT NOT NULL DEFAULT '',
          resolved_at INTEGER NOT NULL
        )
      `);
      legacy.prepare("INSERT INTO folder_identities (folder_path, source_id, resolved_at) VALUES ('/old', '7', 5)").run();
      legacy.close();

      database.initialize();
      const identity = database.getIdentity('/old');
      assert.strictEqual(identity?.sourceId, '7');
      assert.strictEqual(identity?.catalog, '');
      assert.strictEqual(identity?.imageUrl, '');
    });

    it('should refuse to work before initialisation', () => {
      const closed = new DatabaseService(getTempDbPath());
      assert.strictEqual(closed.isOpen(), false);
      assert.throws(() => closed.listIdentities(), /not been initialised/);
    });
  });
});

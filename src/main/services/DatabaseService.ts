/**
 * Thin wrapper around better-sqlite3 providing schema setup and the identity table helpers.
 */
import Database from 'better-sqlite3';
import type { Database as BetterSqliteDatabase } from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { CatalogName, FolderIdentity } from '../../shared/models';

type DbRow = Record<string, unknown>;

const CATALOG_NAMES: readonly CatalogName[] = ['anilist', 'tvdb', ''];

/**
 * Handles persistence for folder identities.
 */
export class DatabaseService {
  private db: BetterSqliteDatabase | null = null;

  public constructor(private readonly dbFilePath: string) {}

  /**
   * Opens the database connection (creating the file if necessary) and ensures the schema exists.
   */
  public initialize(): void {
    const folder = path.dirname(this.dbFilePath);
    if (!fs.existsSync(folder)) {
      fs.mkdirSync(folder, { recursive: true });
    }
    this.db = new Database(this.dbFilePath);
    this.db.pragma('journal_mode = WAL');
    this.applySchema();
  }

  /**
   * Closes the active database connection.
   */
  public close(): void {
    this.db?.close();
    this.db = null;
  }

  public isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Inserts or replaces the identity stored for a folder and returns the stored record.
   */
  public upsertIdentity(identity: FolderIdentity): FolderIdentity {
    const row = this.requireDb()
      .prepare(
        `INSERT INTO folder_identities (
          folder_path,
          source_id,
          catalog,
          romaji_title,
          english_title,
          synopsis,
          image_file_name,
          image_url,
          resolved_at
        ) VALUES (
          @folderPath,
          @sourceId,
          @catalog,
          @romajiTitle,
          @englishTitle,
          @synopsis,
          @imageFileName,
          @imageUrl,
          @resolvedAt
        )
        ON CONFLICT(folder_path) DO UPDATE SET
          source_id = excluded.source_id,
          catalog = excluded.catalog,
          romaji_title = excluded.romaji_title,
          english_title = excluded.english_title,
          synopsis = excluded.synopsis,
          image_file_name = excluded.image_file_name,
          image_url = excluded.image_url,
          resolved_at = excluded.resolved_at
        RETURNING *`
      )
      .get({ ...identity }) as DbRow | undefined;

    if (!row) {
      throw new Error(`Failed to persist identity for ${identity.folderPath}`);
    }
    return this.mapIdentityRow(row);
  }

  /**
   * Returns the identity stored for a folder, or null.
   */
  public getIdentity(folderPath: string): FolderIdentity | null {
    const row = this.requireDb()
      .prepare('SELECT * FROM folder_identities WHERE folder_path = ?')
      .get(folderPath) as DbRow | undefined;
    return row ? this.mapIdentityRow(row) : null;
  }

  /**
   * Lists every stored identity ordered by folder path.
   */
  public listIdentities(): FolderIdentity[] {
    const rows = this.requireDb()
      .prepare('SELECT * FROM folder_identities ORDER BY folder_path ASC')
      .all() as DbRow[];
    return rows.map((row) => this.mapIdentityRow(row));
  }

  /**
   * Deletes the identity for one folder. Returns whether a row was removed.
   */
  public deleteIdentity(folderPath: string): boolean {
    const result = this.requireDb().prepare('DELETE FROM folder_identities WHERE folder_path = ?').run(folderPath);
    return result.changes > 0;
  }

  /**
   * Deletes every identity and returns the number of removed rows.
   */
  public clearIdentities(): number {
    return this.requireDb().prepare('DELETE FROM folder_identities').run().changes;
  }

  /**
   * Maps a raw database row to the strongly typed identity shape.
   */
  private mapIdentityRow(row: DbRow): FolderIdentity {
    const catalog = CATALOG_NAMES.find((name) => name === row.catalog) ?? '';
    return {
      folderPath: typeof row.folder_path === 'string' ? row.folder_path : '',
      sourceId: typeof row.source_id === 'string' ? row.source_id : '',
      catalog,
      romajiTitle: typeof row.romaji_title === 'string' ? row.romaji_title : '',
      englishTitle: typeof row.english_title === 'string' ? row.english_title : '',
      synopsis: typeof row.synopsis === 'string' ? row.synopsis : '',
      imageFileName: typeof row.image_file_name === 'string' ? row.image_file_name : '',
      imageUrl: typeof row.image_url === 'string' ? row.image_url : '',
      resolvedAt: typeof row.resolved_at === 'number' ? row.resolved_at : 0
    };
  }

  /**
   * Lazy accessor ensuring the database has been initialised.
   */
  private requireDb(): BetterSqliteDatabase {
    if (!this.db) {
      throw new Error('Database connection has not been initialised.');
    }
    return this.db;
  }

  /**
   * Applies the schema for the application.
   */
  private applySchema(): void {
    const connection = this.requireDb();
    connection.exec(`
      CREATE TABLE IF NOT EXISTS folder_identities (
        folder_path TEXT PRIMARY KEY,
        source_id TEXT NOT NULL DEFAULT '',
        romaji_title TEXT NOT NULL DEFAULT '',
        english_title TEXT NOT NULL DEFAULT '',
        synopsis TEXT NOT NULL DEFAULT '',
        image_file_name TEXT NOT NULL DEFAULT '',
        resolved_at INTEGER NOT NULL
      );
    `);

    // Columns added after the first release.
    this.addColumnIfMissing(connection, 'folder_identities', 'catalog', "TEXT NOT NULL DEFAULT ''");
    this.addColumnIfMissing(connection, 'folder_identities', 'image_url', "TEXT NOT NULL DEFAULT ''");
  }

  private addColumnIfMissing(connection: BetterSqliteDatabase, table: string, column: string, definition: string): void {
    const info = connection.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    if (!info.some((row) => row.name === column)) {
      connection.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    }
  }
}

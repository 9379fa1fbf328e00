import path from 'node:path';
import type { FolderIdentity } from '../../shared/models';
import { DatabaseService } from './DatabaseService';

/**
 * Normalizes a folder path into the cache key: absolute, no trailing separator.
 */
export function normalizeFolderPath(folderPath: string): string {
  const resolved = path.resolve(folderPath);
  const root = path.parse(resolved).root;
  return resolved.length > root.length ? resolved.replace(/[\\/]+$/, '') : resolved;
}

/**
 * Durable folder → identity map. Read fully on load, written through on every change.
 * Entries never expire; unresolved entries stay until invalidated.
 */
export class IdentityCacheService {
  private readonly entries = new Map<string, FolderIdentity>();
  private loaded = false;

  public constructor(private readonly database: DatabaseService) {}

  /**
   * Reads every stored identity into memory. Returns the number of entries.
   */
  public load(): number {
    this.entries.clear();
    for (const identity of this.database.listIdentities()) {
      this.entries.set(identity.folderPath, identity);
    }
    this.loaded = true;
    return this.entries.size;
  }

  public get(folderPath: string): FolderIdentity | null {
    this.ensureLoaded();
    return this.entries.get(normalizeFolderPath(folderPath)) ?? null;
  }

  public has(folderPath: string): boolean {
    return this.get(folderPath) !== null;
  }

  /**
   * Persists an identity and returns the stored copy.
   */
  public put(identity: FolderIdentity): FolderIdentity {
    this.ensureLoaded();
    const stored = this.database.upsertIdentity({
      ...identity,
      folderPath: normalizeFolderPath(identity.folderPath)
    });
    this.entries.set(stored.folderPath, stored);
    return stored;
  }

  /**
   * Forgets one folder so the next resolution queries the catalogs again.
   */
  public invalidate(folderPath: string): boolean {
    this.ensureLoaded();
    const key = normalizeFolderPath(folderPath);
    this.entries.delete(key);
    return this.database.deleteIdentity(key);
  }

  /**
   * Removes every identity. Returns how many were stored.
   */
  public clear(): number {
    this.entries.clear();
    this.loaded = true;
    return this.database.clearIdentities();
  }

  public list(): FolderIdentity[] {
    this.ensureLoaded();
    return [...this.entries.values()];
  }

  public get size(): number {
    this.ensureLoaded();
    return this.entries.size;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      this.load();
    }
  }
}

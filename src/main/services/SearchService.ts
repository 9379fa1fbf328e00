import Fuse from 'fuse.js';
import { deriveSearchTerm } from './TitleMatcher';

/**
 * A series folder found directly under a library root.
 */
export interface FolderEntry {
  /** Folder name as found on disk. */
  name: string;
  /** Name with release tags and season/quality markers removed. */
  searchTerm: string;
  absolutePath: string;
}

/**
 * Provides fuzzy ranking of local library folders backed by Fuse.js.
 */
export class SearchService {
  private fuse: Fuse<FolderEntry> | null = null;
  private cache: FolderEntry[] = [];

  /**
   * Replaces the indexed folders.
   */
  public rebuildIndex(folders: ReadonlyArray<{ name: string; absolutePath: string }>): void {
    this.cache = folders.map((folder) => ({
      name: folder.name,
      searchTerm: deriveSearchTerm(folder.name),
      absolutePath: folder.absolutePath
    }));
    this.fuse = new Fuse(this.cache, this.createFuseOptions());
  }

  /**
   * Folders ranked by fuzzy similarity to the query, best first.
   * An empty query returns every folder in index order.
   */
  public search(query: string): FolderEntry[] {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return this.getAll();
    }
    return this.ensureFuse()
      .search(trimmed)
      .map((result: Fuse.FuseResult<FolderEntry>) => result.item);
  }

  public getAll(): FolderEntry[] {
    return this.cache;
  }

  private ensureFuse(): Fuse<FolderEntry> {
    if (!this.fuse) {
      this.fuse = new Fuse(this.cache, this.createFuseOptions());
    }
    return this.fuse;
  }

  /**
   * Provides the standard Fuse configuration used by the service.
   */
  private createFuseOptions(): Fuse.IFuseOptions<FolderEntry> {
    return {
      includeScore: true,
      threshold: 0.45,
      ignoreLocation: true,
      keys: [
        { name: 'searchTerm', weight: 0.7 },
        { name: 'name', weight: 0.3 }
      ]
    } satisfies Fuse.IFuseOptions<FolderEntry>;
  }
}

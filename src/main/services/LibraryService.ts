import path from 'node:path';
import fg from 'fast-glob';
import type { RemoteSession } from '../../shared/models';
import { SearchService } from './SearchService';
import type { FolderEntry } from './SearchService';
import { TitleMatcher } from './TitleMatcher';
import { logger } from '../logger';

export const VIDEO_EXTENSIONS = ['mkv', 'mp4', 'avi', 'm4v', 'ts', 'webm'] as const;

/**
 * Finds series folders and episode files inside the local library roots when a
 * server path cannot be translated directly.
 */
export class LibraryService {
  private scanned = false;

  public constructor(
    private readonly search: SearchService,
    private readonly matcher: TitleMatcher,
    private roots: string[] = []
  ) {}

  /**
   * Replaces the library roots; the folder index is rebuilt on next use.
   */
  public setRoots(roots: readonly string[]): void {
    this.roots = [...new Set(roots.map((root) => path.resolve(root)))];
    this.scanned = false;
  }

  /**
   * Lists the folders directly under each root and rebuilds the search index.
   * Returns the number of folders found.
   */
  public async scanFolders(): Promise<number> {
    const folders: Array<{ name: string; absolutePath: string }> = [];
    for (const root of this.roots) {
      const directories = await fg('*', {
        cwd: root,
        absolute: true,
        onlyDirectories: true,
        deep: 1,
        suppressErrors: true
      });
      for (const directory of directories.sort()) {
        const absolutePath = path.normalize(directory);
        folders.push({ name: path.basename(absolutePath), absolutePath });
      }
    }
    this.search.rebuildIndex(folders);
    this.scanned = true;
    logger.debug(`Indexed ${folders.length} library folders`);
    return folders.length;
  }

  /**
   * Folder whose name matches the show title, or null. Rescans once on a miss so that
   * folders added since the last scan are found.
   */
  public async findSeriesFolder(showTitle: string): Promise<string | null> {
    if (!this.scanned) {
      await this.scanFolders();
      return this.pickFolder(showTitle);
    }
    const cached = this.pickFolder(showTitle);
    if (cached) {
      return cached;
    }
    await this.scanFolders();
    return this.pickFolder(showTitle);
  }

  /**
   * Video file for the episode inside a series folder, matched by `S01E02` or `1x02`.
   */
  public async findEpisodeFile(folder: string, seasonNumber: number | null, episodeNumber: number | null): Promise<string | null> {
    if (episodeNumber === null) {
      return null;
    }
    const season = seasonNumber ?? 1;
    const patterns = [
      new RegExp(`s0*${season}\\s*e0*${episodeNumber}(?!\\d)`, 'i'),
      new RegExp(`(?<!\\d)${season}x0*${episodeNumber}(?!\\d)`, 'i')
    ];
    const files = (
      await fg(`**/*.{${VIDEO_EXTENSIONS.join(',')}}`, {
        cwd: folder,
        absolute: true,
        onlyFiles: true,
        suppressErrors: true,
        caseSensitiveMatch: false
      })
    ).sort();
    for (const pattern of patterns) {
      const match = files.find((file) => pattern.test(path.basename(file)));
      if (match) {
        return path.normalize(match);
      }
    }
    return null;
  }

  /**
   * Series folder plus episode file for a remote session, or null when either is missing.
   */
  public async locateEpisode(session: RemoteSession): Promise<string | null> {
    if (this.roots.length === 0) {
      return null;
    }
    const folder = await this.findSeriesFolder(session.showTitle);
    if (!folder) {
      logger.warn(`✖ No local folder found for "${session.showTitle}"`);
      return null;
    }
    const file = await this.findEpisodeFile(folder, session.seasonNumber, session.episodeNumber);
    if (file) {
      logger.info(`✔ Found local episode: ${file}`);
    }
    return file;
  }

  private pickFolder(showTitle: string): string | null {
    const ranked = this.search.search(showTitle);
    const rankedPaths = new Set(ranked.map((entry) => entry.absolutePath));
    const ordered: FolderEntry[] = [
      ...ranked,
      ...this.search.getAll().filter((entry) => !rankedPaths.has(entry.absolutePath))
    ];
    const best = this.matcher.pickBest(
      ordered.map((entry) => ({ candidate: entry, score: this.matcher.matchFolder(entry.name, [showTitle]) }))
    );
    return best ? best.candidate.absolutePath : null;
  }
}

import path from 'node:path';
import type { PathMapping } from '../../shared/models';

const SEASON_DIRECTORY = /^(?:season\s*\d+|s\d{1,2}|specials?|extras?)$/i;

function toForwardSlashes(value: string): string {
  return value.replace(/\\/g, '/').replace(/\/+$/, '');
}

/**
 * Translates server-side file paths to local ones by root prefix, and finds the series
 * folder a local file belongs to.
 */
export class PathMapper {
  private readonly mappings: PathMapping[];

  /**
   * With no mappings, server and local paths are assumed identical.
   */
  public constructor(mappings: readonly PathMapping[]) {
    this.mappings = mappings
      .map((mapping) => ({ remote: toForwardSlashes(mapping.remote), local: path.resolve(mapping.local) }))
      .sort((left, right) => right.remote.length - left.remote.length);
  }

  public get localRoots(): string[] {
    return [...new Set(this.mappings.map((mapping) => mapping.local))];
  }

  /**
   * Local path for a server path, or null when no mapping covers it.
   */
  public toLocal(remotePath: string): string | null {
    if (this.mappings.length === 0) {
      return remotePath;
    }
    const remote = toForwardSlashes(remotePath);
    const mapping = this.mappings.find((entry) => remote === entry.remote || remote.startsWith(`${entry.remote}/`));
    if (!mapping) {
      return null;
    }
    const rest = remote.slice(mapping.remote.length).split('/').filter((segment) => segment.length > 0);
    return path.join(mapping.local, ...rest);
  }

  /**
   * The first directory below the library root that contains the file. A file lying
   * directly in a root stands for itself: its path without the extension, so each such
   * show keeps its own identity. Outside any known root, the file's own directory,
   * skipping a `Season N` style leaf.
   */
  public seriesFolder(localFile: string): string {
    const resolved = path.resolve(localFile);
    for (const root of this.localRoots) {
      const relative = path.relative(root, resolved);
      if (relative.length === 0 || relative.startsWith('..') || path.isAbsolute(relative)) {
        continue;
      }
      const segments = relative.split(path.sep);
      if (segments.length >= 2) {
        return path.join(root, segments[0]);
      }
      return path.join(root, path.parse(relative).name);
    }

    const directory = path.dirname(resolved);
    return SEASON_DIRECTORY.test(path.basename(directory)) ? path.dirname(directory) : directory;
  }
}

import fs from 'node:fs/promises';
import path from 'node:path';
import type { CatalogName, FolderIdentity } from '../../shared/models';
import { TransientNetworkError, describeError } from '../../shared/errors';
import type { FetchFunction } from './catalogs/CatalogClient';
import { withDeadline } from '../utils/deadline';

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.webp', '.gif']);

/**
 * Cache file name for a catalog cover, keyed by catalog and id.
 */
export function coverFileName(catalog: CatalogName, id: string, imageUrl: string): string {
  if (!catalog || !id || !imageUrl) {
    return '';
  }
  let extension = '.jpg';
  try {
    const candidate = path.extname(new URL(imageUrl).pathname).toLowerCase();
    if (IMAGE_EXTENSIONS.has(candidate)) {
      extension = candidate === '.jpeg' ? '.jpg' : candidate;
    }
  } catch {
    // Not a URL; keep the default extension.
  }
  return `${catalog}_${id.replace(/[^A-Za-z0-9-]/g, '_')}${extension}`;
}

export interface CoverImageServiceOptions {
  fetch?: FetchFunction;
  timeoutMs?: number;
}

/**
 * Downloads catalog covers into a directory and serves them from disk afterwards.
 */
export class CoverImageService {
  private readonly fetchFn: FetchFunction;
  private readonly timeoutMs: number;

  public constructor(private readonly directory: string, options: CoverImageServiceOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /**
   * Absolute path of a cached cover, or null when the identity has none.
   */
  public pathFor(identity: FolderIdentity): string | null {
    return identity.imageFileName ? path.join(this.directory, identity.imageFileName) : null;
  }

  /**
   * Makes sure the identity's cover is on disk and returns its path.
   * Returns null when the identity carries no cover reference.
   */
  public async ensureCover(identity: FolderIdentity, signal?: AbortSignal): Promise<string | null> {
    const target = this.pathFor(identity);
    if (!target || !identity.imageUrl) {
      return null;
    }
    if (await this.exists(target)) {
      return target;
    }

    const body = await withDeadline(this.timeoutMs, signal, async (deadline) => {
      let response: Response;
      try {
        response = await this.fetchFn(identity.imageUrl, { signal: deadline });
      } catch (error) {
        throw new TransientNetworkError(`Cover download failed: ${describeError(error)}`, { cause: error });
      }
      if (!response.ok) {
        throw new TransientNetworkError(`Cover download returned ${response.status}`);
      }
      return Buffer.from(await response.arrayBuffer());
    });

    await fs.mkdir(this.directory, { recursive: true });
    const partial = `${target}.part`;
    await fs.writeFile(partial, body);
    await fs.rename(partial, target);
    return target;
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

import type { NowPlayingSnapshot } from '../shared/models';
import type { CoverImageService } from './services/CoverImageService';
import type { NowPlayingStore } from './stores/NowPlayingStore';

const SYNOPSIS_LIMIT = 600;

/**
 * Cuts a synopsis at the last word boundary before `limit` characters and appends an ellipsis.
 */
export function trimSynopsis(synopsis: string, limit = SYNOPSIS_LIMIT): string {
  const text = synopsis.trim();
  if (text.length <= limit) {
    return text;
  }
  const cut = text.slice(0, limit);
  const boundary = cut.lastIndexOf(' ');
  return `${(boundary > 0 ? cut.slice(0, boundary) : cut).trimEnd()}…`;
}

/**
 * Lines shown for a snapshot. Unresolved identities fall back to the server's title.
 */
export function renderSnapshot(snapshot: NowPlayingSnapshot, coverPath: string | null = null): string[] {
  const label = {
    idle: 'Idle',
    playing: 'Playing',
    paused: 'Paused',
    unmatched: 'Unmatched'
  }[snapshot.state];
  const lines = [`● Status: ${label}`];

  const identity = snapshot.identity && snapshot.identity.sourceId ? snapshot.identity : null;
  if (identity) {
    lines.push(`  ${identity.romajiTitle || identity.englishTitle}`);
    if (identity.englishTitle && identity.englishTitle !== identity.romajiTitle) {
      lines.push(`  ${identity.englishTitle}`);
    }
    const synopsis = trimSynopsis(identity.synopsis);
    if (synopsis) {
      lines.push('', ...synopsis.split('\n').map((line) => `  ${line}`));
    }
    if (coverPath) {
      lines.push('', `  Cover: ${coverPath}`);
    }
  } else if (snapshot.remoteTitle) {
    lines.push(`  ${snapshot.remoteTitle}`);
  }

  if (snapshot.note) {
    lines.push(`  ⚠ ${snapshot.note}`);
  }
  return lines;
}

/**
 * Terminal stand-in for the info panel: prints a block whenever what is shown changes.
 */
export class ConsolePanel {
  private lastRendered = '';
  private unsubscribe: (() => void) | null = null;

  public constructor(
    private readonly store: NowPlayingStore,
    private readonly covers: CoverImageService | null = null,
    private readonly write: (text: string) => void = (text) => console.log(text)
  ) {}

  public start(): void {
    this.unsubscribe ??= this.store.subscribe((snapshot) => this.render(snapshot));
  }

  public stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private render(snapshot: NowPlayingSnapshot): void {
    const coverPath = snapshot.identity && this.covers ? this.covers.pathFor(snapshot.identity) : null;
    const text = renderSnapshot(snapshot, coverPath).join('\n');
    if (text === this.lastRendered) {
      return;
    }
    this.lastRendered = text;
    this.write(text);
  }
}

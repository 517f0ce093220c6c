/**
 * Timeline Service - One line of dots per game from moves.csv
 */

import { MoveLabel } from '../types/index.js';
import type { MoveCsvRow } from './OutputWriter.js';

const ANSI = {
  RESET: '\x1b[0m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  ORANGE: '\x1b[38;5;208m',
  RED: '\x1b[31m',
  DIM: '\x1b[2m',
} as const;

export interface TimelineOptions {
  /** Games to show, newest first */
  limit: number;
  myMovesOnly: boolean;
  color: boolean;
  dot: string;
  /** Separator after every N dots; 0 disables */
  sepEvery: number;
  showPositions: boolean;
}

export const DEFAULT_TIMELINE_OPTIONS: TimelineOptions = {
  limit: 10,
  myMovesOnly: false,
  color: true,
  dot: '●',
  sepEvery: 5,
  showPositions: false,
};

function toLabel(raw: string): MoveLabel {
  switch (raw.trim().toLowerCase()) {
    case MoveLabel.BLUNDER:
      return MoveLabel.BLUNDER;
    case MoveLabel.MISTAKE:
      return MoveLabel.MISTAKE;
    case MoveLabel.INACCURACY:
      return MoveLabel.INACCURACY;
    default:
      return MoveLabel.NORMAL;
  }
}

export function plainMarker(label: MoveLabel): string {
  switch (label) {
    case MoveLabel.BLUNDER:
      return 'B';
    case MoveLabel.MISTAKE:
      return 'm';
    case MoveLabel.INACCURACY:
      return 'i';
    default:
      return '.';
  }
}

export function coloredMarker(label: MoveLabel, dot: string): string {
  const colors: Record<MoveLabel, string> = {
    [MoveLabel.BLUNDER]: ANSI.RED,
    [MoveLabel.MISTAKE]: ANSI.ORANGE,
    [MoveLabel.INACCURACY]: ANSI.YELLOW,
    [MoveLabel.NORMAL]: ANSI.GREEN,
  };
  return `${colors[label]}${dot}${ANSI.RESET}`;
}

export class TimelineService {
  render(rows: readonly MoveCsvRow[], overrides: Partial<TimelineOptions> = {}): string[] {
    const options = { ...DEFAULT_TIMELINE_OPTIONS, ...overrides };
    const marker = (label: MoveLabel): string =>
      options.color ? coloredMarker(label, options.dot) : plainMarker(label);
    const separator = options.color ? `${ANSI.DIM}|${ANSI.RESET}` : '|';

    const games = new Map<string, MoveCsvRow[]>();
    for (const row of rows) {
      const list = games.get(row.game_url) ?? [];
      list.push(row);
      games.set(row.game_url, list);
    }

    // Newest first; equal end times keep file order
    const ordered = [...games.entries()]
      .sort(([, a], [, b]) => b[0].end_time_utc.localeCompare(a[0].end_time_utc))
      .slice(0, Math.max(0, options.limit));

    const lines: string[] = [];
    ordered.forEach(([gameUrl, gameRows], index) => {
      const sorted = [...gameRows].sort((a, b) => a.ply - b.ply);
      const shown = options.myMovesOnly ? sorted.filter((row) => row.is_my_move === '1') : sorted;
      const labels = shown.map((row) => toLabel(row.label));

      const positions: Record<MoveLabel, number[]> = {
        [MoveLabel.NORMAL]: [],
        [MoveLabel.INACCURACY]: [],
        [MoveLabel.MISTAKE]: [],
        [MoveLabel.BLUNDER]: [],
      };
      labels.forEach((label, i) => positions[label].push(i + 1));

      let bar = '';
      labels.forEach((label, i) => {
        bar += marker(label);
        const count = i + 1;
        if (options.sepEvery > 0 && count % options.sepEvery === 0 && count !== labels.length) {
          bar += separator;
        }
      });

      const first = sorted[0];
      lines.push(`${index + 1}) vs ${first.opponent || '?'}  (${first.my_color || '?'})  moves=${shown.length}  url=${gameUrl}`);
      lines.push(`   ${bar}`);
      lines.push(
        `   inacc=${positions[MoveLabel.INACCURACY].length}  ` +
          `mistake=${positions[MoveLabel.MISTAKE].length}  ` +
          `blunder=${positions[MoveLabel.BLUNDER].length}`
      );
      if (options.showPositions) {
        if (positions[MoveLabel.INACCURACY].length > 0) {
          lines.push(`   inacc at:   ${positions[MoveLabel.INACCURACY].join(', ')}`);
        }
        if (positions[MoveLabel.MISTAKE].length > 0) {
          lines.push(`   mistake at: ${positions[MoveLabel.MISTAKE].join(', ')}`);
        }
        if (positions[MoveLabel.BLUNDER].length > 0) {
          lines.push(`   blunder at: ${positions[MoveLabel.BLUNDER].join(', ')}`);
        }
      }
      lines.push('');
    });

    lines.push(
      options.color
        ? `Legend: ${marker(MoveLabel.NORMAL)} ok  ${marker(MoveLabel.INACCURACY)} inacc  ` +
            `${marker(MoveLabel.MISTAKE)} mistake  ${marker(MoveLabel.BLUNDER)} blunder`
        : 'Legend: . ok  i inacc  m mistake  B blunder'
    );

    return lines;
  }
}

export const timelineService = new TimelineService();

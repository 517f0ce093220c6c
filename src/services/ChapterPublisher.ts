/**
 * Chapter Publisher - Uploads the biggest blunders to a study, worst first
 */

import { Chapter } from '../types/index.js';
import { LICHESS_API } from '../config/constants.js';
import { logger } from '../utils/logger.js';
import { rankChapters } from './ChapterSynthesizer.js';
import { LichessStudyClient } from './LichessStudyClient.js';

const publisherLogger = logger.child({ service: 'ChapterPublisher' });

export interface PublishOptions {
  /** 0 uploads every selected chapter */
  limit?: number;
  /** Pause between uploads */
  sleepMs?: number;
  dryRun?: boolean;
}

export interface PublishedChapter {
  name: string;
  gameId: string;
  uploaded: boolean;
}

export interface PublishResult {
  gamesConsidered: number;
  chapters: PublishedChapter[];
}

/**
 * "03 Biggest blunder vs bob (0.412) - as Black"
 */
export function chapterName(position: number, chapter: Chapter): string {
  const { opponentName, playerColor, rankingMetric, rankingValue } = chapter.metadata;
  const value = rankingMetric === 'cp_loss' ? String(rankingValue) : rankingValue.toFixed(3);
  const side = playerColor === 'white' ? 'White' : 'Black';
  return `${String(position).padStart(2, '0')} Biggest blunder vs ${opponentName} (${value}) - as ${side}`;
}

/**
 * The highest-ranked chapter of each game. First one wins a tie.
 */
export function worstPerGame(chapters: readonly Chapter[]): Chapter[] {
  const byGame = new Map<string, Chapter>();
  for (const chapter of chapters) {
    const current = byGame.get(chapter.metadata.gameId);
    if (!current || chapter.metadata.rankingValue > current.metadata.rankingValue) {
      byGame.set(chapter.metadata.gameId, chapter);
    }
  }
  return [...byGame.values()];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ChapterPublisher {
  private readonly client: LichessStudyClient;
  private readonly studyId: string;

  constructor(client: LichessStudyClient, studyId: string) {
    this.client = client;
    this.studyId = studyId;
  }

  async publish(chapters: readonly Chapter[], options: PublishOptions = {}): Promise<PublishResult> {
    const { limit = 0, sleepMs = LICHESS_API.UPLOAD_PAUSE, dryRun = false } = options;

    const perGame = worstPerGame(chapters);
    const selected = rankChapters(perGame, limit);
    publisherLogger.info(
      { selected: selected.length, games: perGame.length, studyId: this.studyId, dryRun },
      'Publishing chapters'
    );

    const published: PublishedChapter[] = [];
    for (const [index, chapter] of selected.entries()) {
      const name = chapterName(index + 1, chapter);
      const { gameId } = chapter.metadata;

      if (dryRun) {
        publisherLogger.info({ name, gameId }, 'Dry run: chapter not uploaded');
        published.push({ name, gameId, uploaded: false });
        continue;
      }

      if (index > 0 && sleepMs > 0) {
        await sleep(sleepMs);
      }
      // PublishError propagates; chapters already uploaded stay in the study
      const body = await this.client.importChapter(this.studyId, name, chapter.pgn);
      publisherLogger.info({ name, gameId, response: body.trim().slice(0, 200) }, 'Chapter uploaded');
      published.push({ name, gameId, uploaded: true });
    }

    return { gamesConsidered: perGame.length, chapters: published };
  }
}

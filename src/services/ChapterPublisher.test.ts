import { describe, expect, it } from 'vitest';
import { ChapterPublisher, chapterName, worstPerGame } from './ChapterPublisher.js';
import { ChapterSource, chapterSynthesizer } from './ChapterSynthesizer.js';
import { LichessStudyClient } from './LichessStudyClient.js';
import { Chapter, MoveLabel } from '../types/index.js';
import { PublishError } from '../utils/errors.js';
import { StubReply, StubRequest, fensOf, stubHttp } from '../testing/fakes.js';

const FEN = fensOf(['e4', 'e5'])[2];

function chapter(overrides: Partial<ChapterSource>): Chapter {
  return chapterSynthesizer.synthesize({
    gameId: 'g1',
    playerName: 'alice',
    playerColor: 'white',
    opponentName: 'bob',
    endTime: null,
    ply: 3,
    moveNumber: 2,
    fenBefore: FEN,
    playedUci: 'd1h5',
    bestUci: 'g1f3',
    label: MoveLabel.BLUNDER,
    cpLoss: 310,
    wpSwing: -0.3,
    rankingMetric: 'cp_loss',
    rankingValue: 310,
    ...overrides,
  });
}

function publisherWith(route: (request: StubRequest) => StubReply = () => ({ data: 'ok' })) {
  const stub = stubHttp(route);
  const publisher = new ChapterPublisher(new LichessStudyClient({ token: 'test-secret', http: stub.http }), 'Study01');
  const uploadedNames = () =>
    stub.requests.map((request) => new URLSearchParams(String(request.data)).get('name'));
  return { publisher, uploadedNames };
}

describe('chapterName', () => {
  it('writes the position, opponent, centipawn loss and side', () => {
    expect(chapterName(1, chapter({}))).toBe('01 Biggest blunder vs bob (310) - as White');
  });

  it('writes a win-probability swing with three decimals', () => {
    const swing = chapter({ playerColor: 'black', opponentName: 'carol', rankingMetric: 'wp_swing', rankingValue: 0.41234 });
    expect(chapterName(12, swing)).toBe('12 Biggest blunder vs carol (0.412) - as Black');
  });
});

describe('worstPerGame', () => {
  it('keeps the highest-ranked chapter of each game', () => {
    const chapters = [
      chapter({ gameId: 'g1', rankingValue: 100 }),
      chapter({ gameId: 'g2', rankingValue: 300 }),
      chapter({ gameId: 'g1', rankingValue: 250 }),
      chapter({ gameId: 'g1', rankingValue: 250, opponentName: 'later' }),
    ];

    const worst = worstPerGame(chapters);

    expect(worst.map((entry) => [entry.metadata.gameId, entry.metadata.rankingValue])).toEqual([
      ['g1', 250],
      ['g2', 300],
    ]);
    expect(worst[0].metadata.opponentName).toBe('bob');
  });
});

describe('ChapterPublisher', () => {
  const chapters = [
    chapter({ gameId: 'g1', opponentName: 'bob', rankingValue: 120 }),
    chapter({ gameId: 'g2', opponentName: 'carol', rankingValue: 480 }),
    chapter({ gameId: 'g3', opponentName: 'dave', rankingValue: 300 }),
  ];

  it('uploads worst first with numbered names', async () => {
    const { publisher, uploadedNames } = publisherWith();

    const result = await publisher.publish(chapters, { sleepMs: 0 });

    expect(uploadedNames()).toEqual([
      '01 Biggest blunder vs carol (480) - as White',
      '02 Biggest blunder vs dave (300) - as White',
      '03 Biggest blunder vs bob (120) - as White',
    ]);
    expect(result.gamesConsidered).toBe(3);
    expect(result.chapters.every((entry) => entry.uploaded)).toBe(true);
  });

  it('uploads at most the limit', async () => {
    const { publisher, uploadedNames } = publisherWith();

    const result = await publisher.publish(chapters, { limit: 2, sleepMs: 0 });

    expect(uploadedNames()).toHaveLength(2);
    expect(result.chapters.map((entry) => entry.gameId)).toEqual(['g2', 'g3']);
  });

  it('uploads nothing on a dry run', async () => {
    const { publisher, uploadedNames } = publisherWith();

    const result = await publisher.publish(chapters, { dryRun: true });

    expect(uploadedNames()).toEqual([]);
    expect(result.chapters).toEqual([
      { name: '01 Biggest blunder vs carol (480) - as White', gameId: 'g2', uploaded: false },
      { name: '02 Biggest blunder vs dave (300) - as White', gameId: 'g3', uploaded: false },
      { name: '03 Biggest blunder vs bob (120) - as White', gameId: 'g1', uploaded: false },
    ]);
  });

  it('stops at the first failed upload', async () => {
    let calls = 0;
    const { publisher, uploadedNames } = publisherWith(() => {
      calls++;
      return calls === 2 ? { status: 429, statusText: 'Too Many Requests', data: 'slow down' } : { data: 'ok' };
    });

    await expect(publisher.publish(chapters, { sleepMs: 0 })).rejects.toBeInstanceOf(PublishError);
    expect(uploadedNames()).toHaveLength(2);
  });

  it('pauses between uploads', async () => {
    const { publisher } = publisherWith();
    const started = Date.now();

    await publisher.publish(chapters.slice(0, 2), { sleepMs: 30 });

    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });
});

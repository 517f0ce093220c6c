#!/usr/bin/env node
/**
 * blunder-chapters CLI - Analyze Chess.com games, publish the worst moves as study chapters
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import { Command, InvalidArgumentError, Option } from 'commander';
import { analysisDefaultsFromConfig, config, engineOptionsFromConfig } from './config/index.js';
import { CHESSCOM_API, LICHESS_API } from './config/constants.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { AnalysisPipeline } from './services/AnalysisPipeline.js';
import { ChapterPublisher } from './services/ChapterPublisher.js';
import { chapterSynthesizer } from './services/ChapterSynthesizer.js';
import { ChessComClient } from './services/ChessComClient.js';
import { LichessStudyClient } from './services/LichessStudyClient.js';
import { OutputWriter } from './services/OutputWriter.js';
import { DEFAULT_TIMELINE_OPTIONS, timelineService } from './services/TimelineService.js';
import { CandidatePool, Chapter, RankingMetric, RunResult } from './types/index.js';

const cliLogger = logger.child({ service: 'cli' });

interface AnalyzeOptions {
  maxGames: number;
  depth: number;
  stockfish: string;
  userAgent: string;
  inaccCp: number;
  mistakeCp: number;
  blunderCp: number;
  metric: RankingMetric;
  candidatePool: CandidatePool;
  chapterLimit: number;
}

interface PublishCliOptions {
  study: string;
  token: string;
  metric: RankingMetric;
  limit: number;
  sleep: number;
  dryRun: boolean;
}

interface UploadOptions extends PublishCliOptions {
  blundersCsv?: string;
}

interface TimelineCliOptions {
  moves?: string;
  limit: number;
  myMovesOnly: boolean;
  color: boolean;
  dot: string;
  sepEvery: number;
  showPositions: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a number of seconds.');
  }
  return parsed;
}

function requireValue(value: string | undefined, message: string): string {
  const trimmed = (value ?? '').trim();
  if (!trimmed) {
    throw new InvalidArgumentError(message);
  }
  return trimmed;
}

// ═══════════════════════════════════════════════════════════════════════
// Actions
// ═══════════════════════════════════════════════════════════════════════

/**
 * SIGINT stops the run between two evaluations; the engine is still closed
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    cliLogger.warn('Interrupted, finishing the current evaluation');
    controller.abort();
  });
  return controller.signal;
}

async function analyze(username: string, options: AnalyzeOptions, dataDir: string): Promise<RunResult> {
  const pipeline = new AnalysisPipeline(
    {
      depth: options.depth,
      thresholds: {
        inaccuracy: options.inaccCp,
        mistake: options.mistakeCp,
        blunder: options.blunderCp,
      },
      metric: options.metric,
      candidatePool: options.candidatePool,
      chapterLimit: options.chapterLimit,
      signal: interruptSignal(),
    },
    {
      onGameStart: (game, index) => {
        cliLogger.info(
          { gameId: game.id, opponent: game.opponentName, color: game.playerColor },
          `Analyzing game ${index + 1}`
        );
      },
      onGameFinished: (outcome, summary) => {
        cliLogger.info(
          { gameId: outcome.gameId, status: outcome.status, reason: outcome.reason, worst: summary.worstLabel },
          'Game done'
        );
      },
    }
  );

  const client = new ChessComClient({ userAgent: options.userAgent });
  const result = await pipeline.run(
    client.iterateGames(username, options.maxGames),
    engineOptionsFromConfig(options.stockfish)
  );

  const files = await new OutputWriter(dataDir).writeRun(result);
  cliLogger.info(
    {
      ...files,
      games: result.report.gamesProcessed,
      skipped: result.report.skipped.length,
      failed: result.report.failed.length,
      chapters: result.report.chaptersProduced,
      cancelled: result.report.cancelled,
    },
    'Analysis written'
  );

  return result;
}

async function publish(chapters: readonly Chapter[], options: PublishCliOptions): Promise<void> {
  const studyId = options.dryRun
    ? options.study
    : requireValue(options.study, 'Missing --study (or env LICHESS_STUDY_ID).');
  const token = options.dryRun
    ? options.token
    : requireValue(options.token, 'Missing --token (or env LICHESS_TOKEN).');

  const publisher = new ChapterPublisher(new LichessStudyClient({ token }), studyId);
  const result = await publisher.publish(chapters, {
    limit: options.limit,
    sleepMs: Math.round(options.sleep * 1000),
    dryRun: options.dryRun,
  });

  cliLogger.info(
    {
      games: result.gamesConsidered,
      selected: result.chapters.length,
      uploaded: result.chapters.filter((chapter) => chapter.uploaded).length,
    },
    `Selected ${result.chapters.length} biggest blunders (${options.metric})`
  );
}

async function uploadTop(options: UploadOptions, dataDir: string): Promise<void> {
  const writer = new OutputWriter(dataDir);
  const sources = await writer.readBlunders(options.metric, options.blundersCsv);

  const chapters: Chapter[] = [];
  for (const source of sources) {
    try {
      chapters.push(chapterSynthesizer.synthesize(source));
    } catch (error) {
      cliLogger.warn({ gameId: source.gameId, ply: source.ply, error: errorMessage(error) }, 'Skipping row');
    }
  }

  if (chapters.length === 0) {
    cliLogger.warn('No blunders to upload');
    return;
  }

  await publish(chapters, options);
}

async function timeline(options: TimelineCliOptions, dataDir: string): Promise<void> {
  const rows = await new OutputWriter(dataDir).readMoves(options.moves);
  const lines = timelineService.render(rows, {
    limit: options.limit,
    myMovesOnly: options.myMovesOnly,
    color: options.color,
    dot: options.dot,
    sepEvery: options.sepEvery,
    showPositions: options.showPositions,
  });
  process.stdout.write(lines.join('\n') + '\n');
}

// ═══════════════════════════════════════════════════════════════════════
// Program
// ═══════════════════════════════════════════════════════════════════════

function buildProgram(): Command {
  const defaults = analysisDefaultsFromConfig();
  const program = new Command();

  program
    .name('blunder-chapters')
    .description('Find the biggest blunder of each Chess.com game and publish it as a Lichess study chapter')
    .option('--data-dir <dir>', 'directory for generated files', config.dataDir);

  const metricOption = () =>
    new Option('--metric <metric>', 'ranking metric').choices(['cp_loss', 'wp_swing']).default(defaults.metric);

  const analyzeOptions = (command: Command): Command =>
    command
      .argument('[username]', 'Chess.com username (or env CHESSCOM_USER)', config.chesscomUser)
      .option('--max-games <n>', 'games to look at, newest first', parseInteger, CHESSCOM_API.DEFAULT_MAX_GAMES)
      .option('--depth <n>', 'engine search depth', parseInteger, defaults.depth)
      .option('--stockfish <path>', 'engine executable', config.stockfishPath)
      .option('--user-agent <ua>', 'User-Agent sent to Chess.com', config.chesscomUserAgent)
      .option('--inacc-cp <n>', 'inaccuracy threshold', parseInteger, defaults.thresholds.inaccuracy)
      .option('--mistake-cp <n>', 'mistake threshold', parseInteger, defaults.thresholds.mistake)
      .option('--blunder-cp <n>', 'blunder threshold', parseInteger, defaults.thresholds.blunder)
      .addOption(
        new Option('--candidate-pool <pool>', 'moves a blunder may be picked from')
          .choices(['player', 'notable'])
          .default(defaults.candidatePool)
      )
      .option('--chapter-limit <n>', 'keep only the top N chapters (0 = all)', parseInteger, defaults.chapterLimit);

  const publishOptions = (command: Command): Command =>
    command
      .option('--study <id>', 'study ID (or env LICHESS_STUDY_ID)', config.lichessStudyId)
      .option('--token <token>', 'API token with study:write (or env LICHESS_TOKEN)', config.lichessToken)
      .option('--limit <n>', 'upload at most N chapters (0 = all)', parseInteger, 0)
      .option('--sleep <seconds>', 'pause between uploads', parseSeconds, LICHESS_API.UPLOAD_PAUSE / 1000)
      .option('--dry-run', 'log the chapters instead of uploading', false);

  analyzeOptions(program.command('analyze'))
    .description('Fetch games from Chess.com, run the engine, write data files')
    .addOption(metricOption())
    .action(async (username: string | undefined, options: AnalyzeOptions) => {
      const user = requireValue(username, 'Missing Chess.com username. Pass it or set CHESSCOM_USER.');
      await analyze(user, options, program.opts<{ dataDir: string }>().dataDir);
    });

  publishOptions(program.command('upload-top'))
    .description('Upload the biggest blunder of each game from blunders.csv')
    .option('--blunders-csv <file>', 'path to blunders.csv (default: <data-dir>/blunders.csv)')
    .addOption(metricOption())
    .action(async (options: UploadOptions) => {
      await uploadTop(options, program.opts<{ dataDir: string }>().dataDir);
    });

  publishOptions(analyzeOptions(program.command('sync')))
    .description('Run analyze, then upload the chapters')
    .addOption(metricOption())
    .action(async (username: string | undefined, options: AnalyzeOptions & PublishCliOptions) => {
      const user = requireValue(username, 'Missing Chess.com username. Pass it or set CHESSCOM_USER.');
      const result = await analyze(user, options, program.opts<{ dataDir: string }>().dataDir);
      if (result.report.cancelled) {
        cliLogger.warn('Run was interrupted; nothing uploaded');
        return;
      }
      await publish(result.chapters, options);
    });

  program
    .command('timeline')
    .description('Print a per-game move timeline with blunder markers')
    .option('--moves <file>', 'path to moves.csv (default: <data-dir>/moves.csv)')
    .option('--limit <n>', 'games to show, newest first', parseInteger, DEFAULT_TIMELINE_OPTIONS.limit)
    .option('--my-moves-only', 'show only the player\'s moves', false)
    .option('--no-color', 'disable ANSI colours')
    .option('--dot <char>', 'dot character', DEFAULT_TIMELINE_OPTIONS.dot)
    .option('--sep-every <n>', 'separator every N dots (0 = none)', parseInteger, DEFAULT_TIMELINE_OPTIONS.sepEvery)
    .option('--show-positions', 'print where the issues are', false)
    .action(async (options: TimelineCliOptions) => {
      await timeline(options, program.opts<{ dataDir: string }>().dataDir);
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error) => {
    cliLogger.error({ err: error }, errorMessage(error));
    process.exitCode = 1;
  });

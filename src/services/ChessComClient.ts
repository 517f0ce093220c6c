/**
 * Chess.com Client - Reads a player's recent games from the public API
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Game, PlayerColor } from '../types/index.js';
import { CHESSCOM_API } from '../config/constants.js';
import { logger } from '../utils/logger.js';
import { PgnParserService, pgnParserService } from './PgnParserService.js';

const chesscomLogger = logger.child({ service: 'ChessComClient' });

const archivesSchema = z.object({
  archives: z.array(z.string()).default([]),
});

const playerSchema = z.object({
  username: z.string().default(''),
  rating: z.number().optional(),
  result: z.string().default(''),
});

const archivedGameSchema = z.object({
  url: z.string(),
  pgn: z.string().default(''),
  end_time: z.number().optional(),
  time_control: z.string().default(''),
  time_class: z.string().default(''),
  rules: z.string().default('chess'),
  white: playerSchema.optional(),
  black: playerSchema.optional(),
  accuracies: z
    .object({
      white: z.number().optional(),
      black: z.number().optional(),
    })
    .optional(),
});

const monthSchema = z.object({
  games: z.array(archivedGameSchema).default([]),
});

export type ArchivedGame = z.infer<typeof archivedGameSchema>;

export interface ChessComClientOptions {
  userAgent: string;
  baseURL?: string;
  timeout?: number;
  http?: AxiosInstance;
}

export function pickPlayerColor(game: ArchivedGame, username: string): PlayerColor | null {
  const user = username.toLowerCase();
  if (game.white?.username.toLowerCase() === user) return 'white';
  if (game.black?.username.toLowerCase() === user) return 'black';
  return null;
}

export class ChessComClient {
  readonly http: AxiosInstance;
  private readonly parser: PgnParserService;

  constructor(options: ChessComClientOptions, parser: PgnParserService = pgnParserService) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseURL ?? CHESSCOM_API.BASE_URL,
        timeout: options.timeout ?? CHESSCOM_API.TIMEOUT,
        headers: { 'User-Agent': options.userAgent },
      });
    this.parser = parser;
  }

  async fetchArchives(username: string): Promise<string[]> {
    const response = await this.http.get(`/player/${encodeURIComponent(username.toLowerCase())}/games/archives`);
    return archivesSchema.parse(response.data).archives;
  }

  async fetchMonth(archiveUrl: string): Promise<ArchivedGame[]> {
    const response = await this.http.get(archiveUrl);
    return monthSchema.parse(response.data).games;
  }

  /**
   * Newest games first, one monthly archive at a time.
   * `maxGames` counts every archived game looked at, including the ones skipped.
   */
  async *iterateGames(username: string, maxGames: number = CHESSCOM_API.DEFAULT_MAX_GAMES): AsyncGenerator<Game> {
    if (maxGames <= 0) {
      return;
    }

    const archives = await this.fetchArchives(username);
    let remaining = maxGames;

    for (const archiveUrl of [...archives].reverse()) {
      const games = await this.fetchMonth(archiveUrl);
      games.sort((a, b) => (b.end_time ?? 0) - (a.end_time ?? 0));

      for (const archived of games) {
        const game = this.toGame(archived, username);
        if (game) {
          yield game;
        }
        remaining--;
        if (remaining <= 0) {
          return;
        }
      }
    }
  }

  toGame(archived: ArchivedGame, username: string): Game | null {
    const playerColor = pickPlayerColor(archived, username);
    if (!playerColor) {
      chesscomLogger.debug({ url: archived.url }, 'Skipping game: player took neither side');
      return null;
    }
    if (!archived.pgn.trim()) {
      chesscomLogger.debug({ url: archived.url }, 'Skipping game: empty PGN');
      return null;
    }

    const player = playerColor === 'white' ? archived.white : archived.black;
    const opponent = playerColor === 'white' ? archived.black : archived.white;
    const { initialFen, moves } = this.parser.parseMovetext(archived.pgn);

    return {
      id: archived.url,
      playerName: player?.username ?? username,
      playerColor,
      opponentName: opponent?.username ?? '',
      playerRating: player?.rating ?? null,
      opponentRating: opponent?.rating ?? null,
      result: player?.result ?? '',
      timeControl: archived.time_control,
      timeClass: archived.time_class,
      rules: archived.rules,
      endTime: archived.end_time ? new Date(archived.end_time * 1000).toISOString() : null,
      accuracy: archived.accuracies?.[playerColor] ?? null,
      initialFen,
      moves,
    };
  }
}

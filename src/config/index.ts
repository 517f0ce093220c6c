/**
 * Environment configuration
 */

import { ENGINE_CONFIG, CHESSCOM_API, DEFAULT_THRESHOLDS } from './constants.js';
import { candidatePoolSchema, rankingMetricSchema } from '../utils/validation.js';
import type { EngineSessionOptions } from '../engine/EngineSession.js';
import type { AnalysisDefaults } from '../services/AnalysisPipeline.js';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 3001),
  isProduction: process.env.NODE_ENV === 'production',
  isTest: process.env.NODE_ENV === 'test',
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  apiToken: process.env.API_TOKEN || '',

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:8080')
    .split(',')
    .map((o) => o.trim()),

  // Stockfish
  stockfishPath: process.env.STOCKFISH_PATH || 'stockfish',
  stockfishDepth: intFromEnv('STOCKFISH_DEPTH', ENGINE_CONFIG.DEFAULT_DEPTH),
  stockfishTimeout: intFromEnv('STOCKFISH_TIMEOUT', ENGINE_CONFIG.SEARCH_TIMEOUT),
  stockfishHashMb: intFromEnv('STOCKFISH_HASH_MB', ENGINE_CONFIG.HASH_MB),
  stockfishThreads: intFromEnv('STOCKFISH_THREADS', ENGINE_CONFIG.THREADS),

  // Chess.com
  chesscomUser: process.env.CHESSCOM_USER || '',
  chesscomUserAgent: process.env.CHESSCOM_USER_AGENT || CHESSCOM_API.DEFAULT_USER_AGENT,

  // Lichess
  lichessToken: process.env.LICHESS_TOKEN || '',
  lichessStudyId: process.env.LICHESS_STUDY_ID || '',

  // Pipeline
  dataDir: process.env.DATA_DIR || 'data',
  inaccuracyCp: intFromEnv('INACCURACY_CP', DEFAULT_THRESHOLDS.inaccuracy),
  mistakeCp: intFromEnv('MISTAKE_CP', DEFAULT_THRESHOLDS.mistake),
  blunderCp: intFromEnv('BLUNDER_CP', DEFAULT_THRESHOLDS.blunder),
  rankingMetric: process.env.RANKING_METRIC || 'wp_swing',
  candidatePool: process.env.CANDIDATE_POOL || 'player',
  chapterLimit: intFromEnv('CHAPTER_LIMIT', 0),
} as const;

export type Config = typeof config;

export function validateConfig(): string[] {
  const warnings: string[] = [];

  if (config.isProduction && !config.apiToken) {
    warnings.push('API_TOKEN is not set; every API request will be rejected');
  }
  if (!config.lichessToken || !config.lichessStudyId) {
    warnings.push('LICHESS_TOKEN or LICHESS_STUDY_ID is not set; chapters cannot be published');
  }

  return warnings;
}

/**
 * Engine settings from the environment
 */
export function engineOptionsFromConfig(executablePath: string = config.stockfishPath): EngineSessionOptions {
  return {
    executablePath,
    hashMb: config.stockfishHashMb,
    threads: config.stockfishThreads,
    searchTimeoutMs: config.stockfishTimeout,
  };
}

/**
 * Pipeline defaults from the environment. Throws a ZodError on an unknown
 * metric or candidate pool.
 */
export function analysisDefaultsFromConfig(): AnalysisDefaults {
  return {
    depth: config.stockfishDepth,
    thresholds: {
      inaccuracy: config.inaccuracyCp,
      mistake: config.mistakeCp,
      blunder: config.blunderCp,
    },
    metric: rankingMetricSchema.parse(config.rankingMetric),
    candidatePool: candidatePoolSchema.parse(config.candidatePool),
    chapterLimit: config.chapterLimit,
  };
}

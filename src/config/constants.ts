/**
 * Analysis constants - All scores in centipawns (100cp = 1 pawn)
 */

import type { ClassificationThresholds } from '../classifiers/BlunderClassifier.js';

// ═══════════════════════════════════════════════════════════════════════
// MOVE CLASSIFICATION THRESHOLDS
// ═══════════════════════════════════════════════════════════════════════

/**
 * Default cp_loss thresholds, each inclusive
 */
export const DEFAULT_THRESHOLDS: ClassificationThresholds = {
  inaccuracy: 50,
  mistake: 100,
  blunder: 200,
};

// ═══════════════════════════════════════════════════════════════════════
// SCORE NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════

/**
 * Mate scores saturate near MATE_SCORE, one MATE_DISTANCE_STEP closer to
 * zero per move of mate distance, capped so a mate always outranks any
 * centipawn score.
 */
export const MATE_NORMALIZATION = {
  MATE_SCORE: 10000,
  MATE_DISTANCE_STEP: 10,
  MAX_MATE_DISTANCE: 99,
  CP_CEILING: 9000,
} as const;

/**
 * Logistic scale: +400cp maps to a win probability of ~0.91
 */
export const WIN_PROBABILITY_SCALE = 400;

// ═══════════════════════════════════════════════════════════════════════
// ENGINE SESSION
// ═══════════════════════════════════════════════════════════════════════

export const ENGINE_CONFIG = {
  HANDSHAKE_TIMEOUT: 10000,
  SEARCH_TIMEOUT: 30000,
  CLOSE_GRACE: 2000,
  HASH_MB: 64,
  THREADS: 1,
  DEFAULT_DEPTH: 12,
} as const;

/**
 * A failed engine call is retried once with the same position
 */
export const RETRY_CONFIG = {
  MAX_ATTEMPTS: 2,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════

export const CHESSCOM_API = {
  BASE_URL: 'https://api.chess.com/pub',
  TIMEOUT: 30000,
  DEFAULT_USER_AGENT: 'blunder-chapters/1.0 (contact: you@example.com)',
  DEFAULT_MAX_GAMES: 50,
} as const;

export const LICHESS_API = {
  BASE_URL: 'https://lichess.org',
  TIMEOUT: 30000,
  /** Pause between chapter uploads */
  UPLOAD_PAUSE: 600,
} as const;

export const OUTPUT_FILES = {
  SUMMARY: 'summary.csv',
  MOVES: 'moves.csv',
  BLUNDERS_CSV: 'blunders.csv',
  BLUNDERS_PGN: 'blunders.pgn',
} as const;

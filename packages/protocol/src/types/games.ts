// Game record shapes shared between the parser and its consumers

/**
 * One played half-move as published by the feed.
 */
export type GameMove = {
  /** Standard Algebraic Notation, opaque beyond being text */
  readonly san: string;

  /** Whether the feed annotated this move as coming from the opening book */
  readonly inBook: boolean;

  /** The comment attached to the move when it was committed ("" if none) */
  readonly comment: string;
};

/**
 * PGN tags the game builder requires before a game can be produced.
 */
export const REQUIRED_HEADERS = ['White', 'Black', 'Date', 'Event'] as const;

export type RequiredHeader = (typeof REQUIRED_HEADERS)[number];

/**
 * Comment prefix the feed uses for moves played from the opening book.
 */
export const BOOK_MOVE_COMMENT_PREFIX = 'book,';

/**
 * Plain, loggable view of a parsed game.
 */
export type GameSummary = {
  white: string;
  black: string;
  date: string;
  event: string;
  plies: number;
  openingPlies: number;
  outOfBook: boolean;
  /** Decimal rendering of the identity hash */
  identityHash: string;
};


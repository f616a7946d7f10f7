// @engine-watch/runtime
// PGN ingestion, game identity and the polling turn

// Polling loop (feed → game → seen check → notification)
export {
  runTurn,
  createPoller,
  createLoopState,
  type FeedSource,
  type RecipientsSource,
  type GameNotifier,
  type LoopContext,
  type LoopState,
  type TurnResult,
  type TurnStatus,
  type Poller,
  type PollerOptions,
} from './loop.js';

// Error types
export {
  RuntimeError,
  PgnParseError,
  EmptyPgnError,
  MissingHeaderError,
  MalformedPgnError,
  StateLoadError,
  CorruptStateError,
  StateWriteError,
  FeedFetchError,
  NotifyError,
  ConfigError,
  describeCause,
} from './errors.js';

// Engine names
export { EngineName, normalizeEngineName } from './engines/index.js';

// Games and identity
export { Game, createMove, computeIdentityHash, type GameInit, type IdentityFields } from './games/index.js';

// PGN reading
export {
  PgnTokenizer,
  tokenizePgn,
  readGame,
  GameBuilder,
  parsePgn,
  tryParsePgn,
  type PgnToken,
  type PgnTokenKind,
  type GameResult,
  type PgnVisitor,
  type GameBuilderOptions,
  type OrphanCommentPolicy,
  type ParsePgnOptions,
  type ParsePgnResult,
} from './pgn/index.js';

// Seen games
export { SeenGames } from './state/index.js';

// Recipients and messages
export {
  buildEngineRecipients,
  engineRecipientsEqual,
  selectRecipients,
  formatMention,
  formatNotification,
  type RecipientSelection,
} from './notify/index.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  isLevelEnabled,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging/index.js';

// @engine-watch/protocol
// Data shapes and formats shared by every engine-watch package

export * from './types/index.js';

export {
  validateUsersConfig,
  isUsersConfigFile,
  parseUsersConfig,
  type UsersConfigValidationResult,
  type UsersConfigValidationIssue,
  type UsersConfigErrorCode,
  type UsersConfigWarningCode,
} from './validation/users-config.js';

export {
  SEEN_GAMES_LOG_FILE,
  SeenGamesLogFormatError,
  parseIdentityHash,
  isIdentityHash,
  parseSeenGamesLog,
  stringifySeenGamesLogLine,
  type SeenGamesLogLineError,
} from './state/seen-games-log.js';

export {
  PgnTokenizer,
  tokenizePgn,
  type PgnToken,
  type PgnTokenKind,
  type GameResult,
} from './tokenizer.js';
export { readGame, type PgnVisitor } from './visitor.js';
export { GameBuilder, type GameBuilderOptions, type OrphanCommentPolicy } from './game-builder.js';
export { parsePgn, tryParsePgn, type ParsePgnOptions, type ParsePgnResult } from './parse.js';

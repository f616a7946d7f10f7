// Polling loop - one turn fetches the feed, identifies the game and notifies once
//
// Turns are strictly sequential: the poller never starts a turn while another
// is running, and nothing inside a turn retries. The poll interval is the
// retry policy.

import type {
  EngineRecipients,
  NotificationContent,
  RecipientId,
} from '@engine-watch/protocol';
import { describeCause, type PgnParseError } from './errors.js';
import type { Game } from './games/index.js';
import { consoleLogger, type Logger } from './logging/index.js';
import { engineRecipientsEqual, selectRecipients } from './notify/index.js';
import { tryParsePgn, type ParsePgnOptions } from './pgn/index.js';
import type { SeenGames } from './state/index.js';

/**
 * Source of the live PGN text
 */
export interface FeedSource {
  fetchPgn(): Promise<string>;
}

/**
 * Source of the engine → users map
 */
export interface RecipientsSource {
  load(): Promise<EngineRecipients>;
}

/**
 * Delivers a new-game notification
 */
export interface GameNotifier {
  notify(content: NotificationContent): Promise<void>;
}

/**
 * Collaborators of a turn
 */
export type LoopContext = {
  feed: FeedSource;
  recipientsSource: RecipientsSource;
  notifier: GameNotifier;
  seenGames: SeenGames;

  /**
   * Logger (default: console)
   */
  logger?: Logger;

  /**
   * Options for parsing the feed
   */
  parseOptions?: ParsePgnOptions;
};

/**
 * State carried from one turn to the next
 */
export type LoopState = {
  /**
   * Recipients as of the last successful reload
   */
  recipients: EngineRecipients;

  /**
   * Whether a game past its book has been reported yet in this process
   */
  reportedInProgress: boolean;
};

export function createLoopState(recipients: EngineRecipients): LoopState {
  return { recipients, reportedInProgress: false };
}

/**
 * Outcome of a single turn
 */
export type TurnResult =
  | { status: 'fetch_failed'; error: unknown }
  | { status: 'parse_failed'; error: PgnParseError }
  | { status: 'in_book'; game: Game }
  | { status: 'already_seen'; game: Game }
  | {
      status: 'notified';
      game: Game;
      mentions: RecipientId[];
      /** Set when delivery failed; the game is still recorded as seen */
      notifyError?: unknown;
      /** Set when the seen-games record could not be written */
      persistError?: unknown;
    };

export type TurnStatus = TurnResult['status'];

async function refreshRecipients(ctx: LoopContext, state: LoopState, logger: Logger): Promise<void> {
  let recipients: EngineRecipients;
  try {
    recipients = await ctx.recipientsSource.load();
  } catch (error) {
    logger.warn(`Unable to reload users config, keeping the previous one: ${describeCause(error)}`);
    return;
  }

  if (!engineRecipientsEqual(state.recipients, recipients)) {
    logger.info('Users config changed', { engines: recipients.size });
    state.recipients = recipients;
  }
}

function describeGame(game: Game): string {
  return `${game.white} vs. ${game.black}`;
}

/**
 * Run one turn of the loop.
 *
 * Collaborator failures are logged and reported in the result; only
 * unexpected errors reject.
 */
export async function runTurn(ctx: LoopContext, state: LoopState): Promise<TurnResult> {
  const logger = ctx.logger ?? consoleLogger;

  await refreshRecipients(ctx, state, logger);

  let text: string;
  try {
    text = await ctx.feed.fetchPgn();
  } catch (error) {
    logger.warn(`Unable to fetch the feed: ${describeCause(error)}`);
    return { status: 'fetch_failed', error };
  }

  const parsed = tryParsePgn(text, ctx.parseOptions);
  if (!parsed.ok) {
    logger.warn(`Unable to parse the feed: ${parsed.error.message}`, { code: parsed.error.code });
    return { status: 'parse_failed', error: parsed.error };
  }

  const game = parsed.game;
  if (!game.outOfBook()) {
    logger.debug(`Still in book: ${describeGame(game)}`);
    return { status: 'in_book', game };
  }

  if (!state.reportedInProgress) {
    state.reportedInProgress = true;
    logger.info(`In progress: ${describeGame(game)}`, game.toSummary());
  }

  if (ctx.seenGames.contains(game)) {
    return { status: 'already_seen', game };
  }

  logger.info(`New game: ${describeGame(game)}`, game.toSummary());

  const selection = selectRecipients(game, state.recipients);
  for (const engine of selection.matchedEngines) {
    logger.info(`Notifying followers of ${engine}`, {
      users: [...(state.recipients.get(engine) ?? [])],
    });
  }

  let notifyError: unknown;
  try {
    await ctx.notifier.notify({
      tournament: game.event,
      white: game.white.raw,
      black: game.black.raw,
      mentions: selection.mentions,
    });
  } catch (error) {
    notifyError = error;
    logger.error(`Unable to send notification: ${describeCause(error)}`);
  }

  let persistError: unknown;
  try {
    await ctx.seenGames.add(game);
  } catch (error) {
    persistError = error;
    logger.error(describeCause(error));
  }

  return { status: 'notified', game, mentions: selection.mentions, notifyError, persistError };
}

export type PollerOptions = {
  /**
   * Delay between the end of one turn and the start of the next
   */
  intervalMs: number;
};

export interface Poller {
  /** Run a turn now, then keep polling until stop() */
  start(): void;
  /** Cancel the next turn and wait for a running one to finish */
  stop(): Promise<void>;
  /** Run a single turn, or join the one already running */
  runOnce(): Promise<TurnResult>;
  readonly running: boolean;
}

/**
 * Create a poller that runs turns back to back, `intervalMs` apart.
 */
export function createPoller(ctx: LoopContext, state: LoopState, options: PollerOptions): Poller {
  const logger = ctx.logger ?? consoleLogger;
  let active = false;
  let timer: NodeJS.Timeout | null = null;
  let current: Promise<TurnResult> | null = null;
  let inflight: Promise<void> | null = null;

  const runOnce = async (): Promise<TurnResult> => {
    if (current) {
      return current;
    }
    current = runTurn(ctx, state);
    try {
      return await current;
    } finally {
      current = null;
    }
  };

  const schedule = (): void => {
    if (active) {
      timer = setTimeout(tick, options.intervalMs);
    }
  };

  function tick(): void {
    timer = null;
    inflight = runOnce()
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error(`Turn failed: ${describeCause(error)}`);
        }
      )
      .finally(() => {
        inflight = null;
        schedule();
      });
  }

  return {
    start() {
      if (active) return;
      active = true;
      tick();
    },

    async stop() {
      active = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (inflight) {
        await inflight;
      }
    },

    runOnce,

    get running() {
      return active;
    },
  };
}

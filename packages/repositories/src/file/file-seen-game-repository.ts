// Filesystem implementation of SeenGameRepository.
// Uses Node.js fs module; the log format lives in @engine-watch/protocol.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  SEEN_GAMES_LOG_FILE,
  parseSeenGamesLog,
  stringifySeenGamesLogLine,
  type IdentityHash,
} from '@engine-watch/protocol';
import type { SeenGameRepository } from '../interfaces/index.js';

/**
 * Options for the file-backed repository
 */
export type FileSeenGameRepositoryOptions = {
  /**
   * Path of the log file (defaults to "state.bin" in the working directory)
   */
  filePath?: string;

  /**
   * Flush file data to disk after every append (default: true)
   */
  sync?: boolean;
};

/**
 * Seen-games record kept as a plain text file, one decimal hash per line.
 *
 * The file is opened once in append mode and the handle is held until
 * close(), so nothing else in the process writes to it.
 */
export class FileSeenGameRepository implements SeenGameRepository {
  readonly filePath: string;
  private readonly sync: boolean;
  private handle: fs.FileHandle | null = null;

  constructor(options: FileSeenGameRepositoryOptions = {}) {
    this.filePath = options.filePath ?? SEEN_GAMES_LOG_FILE;
    this.sync = options.sync ?? true;
  }

  /**
   * Open (creating if needed) the log file.
   *
   * An unterminated last line, left by an interrupted append or a hand
   * edit, is closed with a newline so the next append starts a line of
   * its own.
   */
  async open(): Promise<fs.FileHandle> {
    if (!this.handle) {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.open(this.filePath, 'a+');
      try {
        await terminateLastLine(handle);
      } catch (error) {
        await handle.close();
        throw error;
      }
      this.handle = handle;
    }
    return this.handle;
  }

  async loadAll(): Promise<IdentityHash[]> {
    await this.open();
    const content = await fs.readFile(this.filePath, 'utf-8');
    return parseSeenGamesLog(content);
  }

  async append(hash: IdentityHash): Promise<void> {
    const handle = await this.open();
    await handle.write(stringifySeenGamesLogLine(hash));
    if (this.sync) {
      await handle.datasync();
    }
  }

  async close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }
}

const NEWLINE = 0x0a;

async function terminateLastLine(handle: fs.FileHandle): Promise<void> {
  const { size } = await handle.stat();
  if (size === 0) {
    return;
  }
  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  if (last[0] !== NEWLINE) {
    await handle.write('\n');
  }
}

/**
 * Create a SeenGameRepository backed by a local text file.
 */
export function createFileSeenGameRepository(
  options: FileSeenGameRepositoryOptions = {}
): FileSeenGameRepository {
  return new FileSeenGameRepository(options);
}

// @engine-watch/repositories
// Storage contracts and implementations for the seen-games record.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - The runtime codes against SeenGameRepository and never touches storage directly
// - File storage is the default; Postgres and in-memory fulfil the same contract

export * from './interfaces/index.js';
export * from './file/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';

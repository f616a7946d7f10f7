export { PgSeenGameRepository, createPgSeenGameRepository } from './seen-game-repository.js';

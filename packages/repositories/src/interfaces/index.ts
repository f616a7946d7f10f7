// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { SeenGameRepository } from './seen-game-repository.js';

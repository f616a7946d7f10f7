// File-backed seen-games record

export {
  FileSeenGameRepository,
  createFileSeenGameRepository,
  type FileSeenGameRepositoryOptions,
} from './file-seen-game-repository.js';

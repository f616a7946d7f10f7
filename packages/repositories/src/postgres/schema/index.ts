// Re-export all schema tables
export * from './seen-games.js';

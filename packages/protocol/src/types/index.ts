// Re-export all protocol types

export * from './common.js';
export * from './games.js';
export * from './notify.js';

export { Game, createMove, type GameInit } from './game.js';
export { computeIdentityHash, type IdentityFields } from './identity.js';

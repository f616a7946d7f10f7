export { SeenGames } from './seen-games.js';

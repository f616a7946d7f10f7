export { EngineName, normalizeEngineName } from './engine-name.js';

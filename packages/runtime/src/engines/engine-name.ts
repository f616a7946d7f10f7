// Engine display names and the fuzzy identity they compare by

// " 2", " v2", " 2.0", " v1.2.3" at the very end
const VERSION_SUFFIX = / v?\d+(\.\d+)?(\.\d+)?$/;

// " 2025a" build tags; the feed sometimes puts these before other suffix text,
// so they are removed wherever they occur
const DATE_VERSION_TOKEN = / \d{4}[a-z]/g;

/**
 * Reduce an engine name to the form used for equality and matching.
 *
 * Lower-cases, then strips a trailing version number, then strips date-coded
 * build tags, trimming after each step. A name whose last word really is a
 * number ("Chess 4") loses it exactly as a version would; that is a known
 * limit of the heuristic, not an error.
 */
export function normalizeEngineName(name: string): string {
  let normalized = name.toLowerCase();
  normalized = normalized.replace(VERSION_SUFFIX, '').trim();
  normalized = normalized.replace(DATE_VERSION_TOKEN, '').trim();
  return normalized;
}

/**
 * An engine's name as published by the feed.
 *
 * Two EngineNames are equal when their normalized forms are equal, so
 * "Lunar 2.0.1" and "lunar" are the same engine. Anything that keys a Map or
 * Set by engine must use `key`, never `raw`, or equality and hashing would
 * disagree.
 */
export class EngineName {
  /** The name exactly as published; used for display */
  readonly raw: string;

  /** Normalized form; the identity of this engine */
  readonly key: string;

  constructor(raw: string) {
    this.raw = raw;
    this.key = normalizeEngineName(raw);
  }

  /**
   * Whether a (usually shorter) configured name refers to this engine.
   * Asymmetric: the candidate's normalized form must be contained in ours.
   *
   * @example
   * new EngineName('Lunar 2.0.1').matches('Lunar'); // true
   * new EngineName('Lunar').matches('Lunar 2.0.1'); // true (versions are stripped on both sides)
   * new EngineName('Lunar').matches('Lunar Chess'); // false
   */
  matches(candidate: string): boolean {
    return this.key.includes(normalizeEngineName(candidate));
  }

  equals(other: EngineName): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.raw;
  }

  toJSON(): string {
    return this.raw;
  }
}

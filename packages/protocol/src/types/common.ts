// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Unsigned 64-bit game fingerprint.
 * Persisted as its base-10 rendering, one per line.
 */
export type IdentityHash = bigint;

/**
 * Identifier of a notification recipient (a chat user id).
 */
export type RecipientId = string;

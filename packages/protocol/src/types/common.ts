// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Opaque patient token, e.g. "batman_ab12cd34".
 * Never reversible outside the tokenization service.
 */
export type Token = string;

/**
 * Any value that survives a JSON round trip unchanged.
 * Agent snapshots are stored as JSON, so they must be expressible this way.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object (the usual shape of an agent snapshot).
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Time window for aggregate queries.
 * `hours` is a trailing window ending now; `since`/`until` are absolute bounds.
 */
export type TimeWindow = {
  hours?: number;
  since?: Timestamp;
  until?: Timestamp;
};

/**
 * Progress entries shown to the human following a session.
 */

export interface StatusEntry {
  id: string;
  sessionId: string;
  message: string;
  /** ISO-8601 timestamp. */
  timestamp: string;
  /** Monotonic per-reporter ordering key; breaks ties inside one millisecond. */
  sequence: number;
}

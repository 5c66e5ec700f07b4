/**
 * @relaykit/core — History Storage Interface
 *
 * Append-only record of attempted deliveries. Implementations keep insertion
 * order and expose no update or delete operation.
 */

import type { HistoryEntry } from './types.js';

export interface HistoryStore {
  append(entry: HistoryEntry): void;
  /** Entries in insertion order */
  all(): readonly HistoryEntry[];
  /** Entries whose reference equals the order id */
  filterByOrder(orderId: string): readonly HistoryEntry[];
  /** Entries whose recipient contains the given substring */
  filterByRecipient(substr: string): readonly HistoryEntry[];
  readonly size: number;
}

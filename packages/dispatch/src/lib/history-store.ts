import type { HistoryEntry, HistoryStore } from '@relaykit/core';
import { deepFreeze } from './immutable.js';

/**
 * Process-lifetime history. Entries are copied and deep-frozen on append; the backing
 * array is never handed out.
 */
export class InMemoryHistoryStore implements HistoryStore {
  private entries: HistoryEntry[] = [];

  append(entry: HistoryEntry): void {
    this.entries.push(deepFreeze(structuredClone(entry)));
  }

  all(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  filterByOrder(orderId: string): readonly HistoryEntry[] {
    return this.entries.filter((e) => e.reference === orderId);
  }

  filterByRecipient(substr: string): readonly HistoryEntry[] {
    return this.entries.filter((e) => e.recipient !== undefined && e.recipient.includes(substr));
  }

  get size(): number {
    return this.entries.length;
  }
}

import { describe, it, expect } from 'vitest';
import type { HistoryEntry } from '@relaykit/core';
import { InMemoryHistoryStore } from '../history-store.js';

function entry(id: string, overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    id,
    requestId: 'req-1',
    pipeline: 'notification',
    kind: 'email',
    format: 'email',
    deliveryMethod: 'email',
    timestamp: '2024-01-31T09:30:05.000Z',
    outcome: 'success',
    summary: '',
    metadata: {},
    ...overrides,
  };
}

describe('InMemoryHistoryStore', () => {
  it('returns entries in insertion order', () => {
    const store = new InMemoryHistoryStore();
    store.append(entry('a'));
    store.append(entry('b'));
    store.append(entry('c'));
    expect(store.all().map((e) => e.id)).toEqual(['a', 'b', 'c']);
    expect(store.size).toBe(3);
  });

  it('all() is stable without intervening appends', () => {
    const store = new InMemoryHistoryStore();
    store.append(entry('a'));
    expect(store.all()).toEqual(store.all());
  });

  it('does not expose its backing array', () => {
    const store = new InMemoryHistoryStore();
    store.append(entry('a'));
    const snapshot = store.all();
    store.append(entry('b'));
    expect(snapshot).toHaveLength(1);
    expect(store.size).toBe(2);
  });

  it('freezes appended entries', () => {
    const store = new InMemoryHistoryStore();
    store.append(entry('a'));
    const [stored] = store.all();
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('keeps its own frozen copy of entry metadata', () => {
    const store = new InMemoryHistoryStore();
    const categories = ['Parts'];
    store.append(entry('a', { metadata: { totalItems: 3, categories } }));
    categories.push('changed');

    const stored = store.all()[0]?.metadata;
    expect(stored).toEqual({ totalItems: 3, categories: ['Parts'] });
    expect(Object.isFrozen(stored?.categories)).toBe(true);
  });

  it('filters by order reference', () => {
    const store = new InMemoryHistoryStore();
    store.append(entry('a', { reference: 'ORD-1' }));
    store.append(entry('b', { reference: 'ORD-2' }));
    store.append(entry('c', { reference: 'ORD-1' }));
    store.append(entry('d'));
    expect(store.filterByOrder('ORD-1').map((e) => e.id)).toEqual(['a', 'c']);
    expect(store.filterByOrder('ORD-9')).toEqual([]);
  });

  it('filters by recipient substring', () => {
    const store = new InMemoryHistoryStore();
    store.append(entry('a', { recipient: 'first@example.com' }));
    store.append(entry('b', { recipient: '+1-555-010-0199' }));
    store.append(entry('c'));
    expect(store.filterByRecipient('example.com').map((e) => e.id)).toEqual(['a']);
    expect(store.filterByRecipient('555').map((e) => e.id)).toEqual(['b']);
  });
});

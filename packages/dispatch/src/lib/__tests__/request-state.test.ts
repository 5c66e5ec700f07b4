import { describe, it, expect } from 'vitest';
import { RequestTracker, canTransition, settleStatus } from '../request-state.js';

describe('RequestTracker', () => {
  it('walks the happy path', () => {
    const tracker = new RequestTracker('req-1');
    tracker.advance('content_built');
    tracker.advance('formatted');
    tracker.advance('delivering');
    tracker.advance('delivered');
    tracker.advance('logged');
    expect(tracker.trail).toEqual(['received', 'content_built', 'formatted', 'delivering', 'delivered', 'logged']);
    expect(tracker.current).toBe('logged');
  });

  it('rejects an illegal transition', () => {
    const tracker = new RequestTracker('req-1');
    expect(() => tracker.advance('delivered')).toThrow('Illegal transition for request req-1: received → delivered');
  });

  it('allows rejection only before formatting completes', () => {
    expect(canTransition('received', 'rejected')).toBe(true);
    expect(canTransition('content_built', 'rejected')).toBe(true);
    expect(canTransition('delivering', 'rejected')).toBe(false);
  });

  it('treats rejected and logged as terminal', () => {
    expect(canTransition('rejected', 'logged')).toBe(false);
    expect(canTransition('logged', 'received')).toBe(false);
  });
});

describe('settleStatus', () => {
  it('is delivered when every attempt succeeded', () => {
    expect(settleStatus(3, 3, false)).toBe('delivered');
  });

  it('is partially_failed on a mix', () => {
    expect(settleStatus(2, 3, false)).toBe('partially_failed');
  });

  it('is failed when nothing succeeded', () => {
    expect(settleStatus(0, 2, false)).toBe('failed');
  });

  it('is cancelled regardless of counts', () => {
    expect(settleStatus(1, 1, true)).toBe('cancelled');
  });
});

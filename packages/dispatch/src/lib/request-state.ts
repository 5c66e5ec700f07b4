/**
 * Per-request state machine.
 *
 *   received → content_built → formatted → delivering → delivered | partially_failed | failed → logged
 *   received | content_built → rejected
 *   any non-terminal → cancelled
 */

import type { DispatchStatus, RequestState } from '@relaykit/core';

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  received: ['content_built', 'rejected', 'cancelled'],
  content_built: ['formatted', 'rejected', 'cancelled'],
  formatted: ['delivering', 'cancelled'],
  delivering: ['delivered', 'partially_failed', 'failed', 'cancelled'],
  delivered: ['logged'],
  partially_failed: ['logged'],
  failed: ['logged'],
  cancelled: ['logged'],
  rejected: [],
  logged: [],
};

export function canTransition(from: RequestState, to: RequestState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class RequestTracker {
  private states: RequestState[] = ['received'];

  constructor(readonly requestId: string) {}

  get current(): RequestState {
    return this.states[this.states.length - 1] ?? 'received';
  }

  advance(next: RequestState): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal transition for request ${this.requestId}: ${this.current} → ${next}`);
    }
    this.states.push(next);
  }

  get trail(): RequestState[] {
    return [...this.states];
  }
}

/** Terminal delivery state for a set of per-route outcomes */
export function settleStatus(successes: number, attempted: number, cancelled: boolean): DispatchStatus {
  if (cancelled) return 'cancelled';
  if (attempted > 0 && successes === attempted) return 'delivered';
  if (successes === 0) return 'failed';
  return 'partially_failed';
}

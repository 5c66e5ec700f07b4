/**
 * Orchestrator
 *
 * Runs a request through generate → format → deliver for each of its routes
 * and appends one history entry per attempted delivery. Used by both the
 * report and the notification facades.
 *
 * Tag resolution and content generation happen for every route before the
 * first delivery, so an unknown tag or a bad payload rejects the whole
 * request without history. Once delivering, a failed route never stops the
 * routes after it.
 */

import { ulid } from 'ulid';
import {
  DEFAULT_DELIVERY_TIMEOUT_MS,
  HISTORY_SUMMARY_LENGTH,
  RequestCancelledError,
  getErrorMessage,
  type Content,
  type ContentGenerator,
  type DeliveryResult,
  type DeliveryStrategy,
  type DispatchOutcome,
  type DispatchRequest,
  type FinalArtifact,
  type Formatter,
  type HistoryEntry,
  type HistoryStore,
  type Route,
} from '@relaykit/core';
import { deepFreeze } from './immutable.js';
import type { Registries } from './registry.js';
import { RequestTracker, settleStatus } from './request-state.js';
import { systemClock, type Clock } from './clock.js';
import { createLogger, type Logger } from './logger.js';

export interface OrchestratorDeps extends Registries {
  history: HistoryStore;
  clock?: Clock;
  logger?: Logger;
  deliveryTimeoutMs?: number;
}

export interface RunOptions {
  /** Aborting cancels the delivery in flight and skips the routes after it */
  signal?: AbortSignal;
}

interface RoutePlan {
  route: Route;
  generator: ContentGenerator;
  formatter: Formatter;
  delivery: DeliveryStrategy;
}

interface RouteStage extends RoutePlan {
  content: Content;
  artifact: FinalArtifact;
}

export class Orchestrator {
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly deliveryTimeoutMs: number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger('Orchestrator');
    this.deliveryTimeoutMs = deps.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
  }

  async run(request: DispatchRequest, options: RunOptions = {}): Promise<DispatchOutcome> {
    const { signal } = options;
    const tracker = new RequestTracker(request.id);

    let stages: RouteStage[];
    try {
      const plans = request.routes.map((route) => this.resolve(route));
      const now = this.clock.now();
      // Stages downstream get a frozen copy; nothing they do reaches the generator's objects
      const built = plans.map((plan) => ({
        ...plan,
        content: deepFreeze(structuredClone(plan.generator.generate(request.payload, { now }))),
      }));
      tracker.advance('content_built');
      this.throwIfCancelled(request, tracker, signal);

      stages = built.map((stage) => ({ ...stage, artifact: stage.formatter.apply(stage.content) }));
      tracker.advance('formatted');
      this.throwIfCancelled(request, tracker, signal);
    } catch (err) {
      if (tracker.current !== 'cancelled') tracker.advance('rejected');
      this.log.warn(`Request ${request.id} rejected: ${getErrorMessage(err)}`, { trail: tracker.trail });
      throw err;
    }

    tracker.advance('delivering');
    const results: DeliveryResult[] = [];
    const entries: HistoryEntry[] = [];
    let cancelled = false;

    for (const stage of stages) {
      if (signal?.aborted) {
        cancelled = true;
        this.log.warn(`Request ${request.id} cancelled; ${stages.length - results.length} route(s) not attempted`);
        break;
      }

      const result = await this.attempt(stage, request, signal);
      results.push(result);
      entries.push(this.record(request, stage, result));

      if (result.errorCode === 'DELIVERY_CANCELLED') cancelled = true;
      if (result.success) {
        this.log.info(`Delivered ${stage.route.generator} via ${stage.route.delivery}`, { requestId: request.id });
      } else {
        this.log.warn(`Delivery via ${stage.route.delivery} failed: ${result.error}`, { requestId: request.id });
      }
    }

    const successes = results.filter((r) => r.success).length;
    const status = settleStatus(successes, results.length, cancelled);
    tracker.advance(status);
    tracker.advance('logged');

    return {
      requestId: request.id,
      status,
      contents: stages.map((s) => s.content),
      artifacts: stages.map((s) => s.artifact),
      results,
      entries,
      trail: tracker.trail,
    };
  }

  private resolve(route: Route): RoutePlan {
    return {
      route,
      generator: this.deps.generators.resolve(route.generator),
      formatter: this.deps.formatters.resolve(route.formatter),
      delivery: this.deps.deliveries.resolve(route.delivery),
    };
  }

  private throwIfCancelled(request: DispatchRequest, tracker: RequestTracker, signal?: AbortSignal): void {
    if (!signal?.aborted) return;
    tracker.advance('cancelled');
    throw new RequestCancelledError(request.id);
  }

  /**
   * One bounded delivery. The strategy sees an AbortSignal that fires on
   * timeout or caller cancellation; whichever settles first wins.
   */
  private async attempt(stage: RouteStage, request: DispatchRequest, outer?: AbortSignal): Promise<DeliveryResult> {
    const method = stage.route.delivery;
    const recipient = stage.route.recipient;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.deliveryTimeoutMs);
    const forward = () => controller.abort();
    outer?.addEventListener('abort', forward, { once: true });

    const interrupted = new Promise<DeliveryResult>((resolve) => {
      controller.signal.addEventListener('abort', () => {
        resolve(timedOut
          ? { success: false, method, recipient, errorCode: 'DELIVERY_TIMEOUT', error: `Delivery timed out after ${this.deliveryTimeoutMs}ms` }
          : { success: false, method, recipient, errorCode: 'DELIVERY_CANCELLED', error: 'Delivery cancelled' });
      }, { once: true });
    });

    try {
      return await Promise.race([
        stage.delivery.deliver(stage.artifact, recipient, {
          signal: controller.signal,
          now: this.clock.now(),
          requestId: request.id,
        }),
        interrupted,
      ]);
    } catch (err) {
      return { success: false, method, recipient, errorCode: 'DELIVERY_FAILED', error: getErrorMessage(err) };
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', forward);
    }
  }

  private record(request: DispatchRequest, stage: RouteStage, result: DeliveryResult): HistoryEntry {
    const now = this.clock.now();
    const entry: HistoryEntry = {
      id: ulid(now.getTime()),
      requestId: request.id,
      pipeline: request.pipeline,
      kind: stage.route.generator,
      format: stage.route.formatter,
      deliveryMethod: stage.route.delivery,
      recipient: result.recipient ?? stage.route.recipient,
      reference: request.reference,
      timestamp: now.toISOString(),
      outcome: result.success ? 'success' : 'failed',
      error: result.error,
      summary: stage.artifact.rendered.slice(0, HISTORY_SUMMARY_LENGTH),
      metadata: stage.content.metadata,
    };
    this.deps.history.append(entry);
    return entry;
  }
}

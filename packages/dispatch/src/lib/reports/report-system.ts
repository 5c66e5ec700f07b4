/**
 * Report pipeline facade.
 *
 * `createReportRequest` builds the immutable request in one step (every
 * selector required and validated up front); `ReportSystem` runs it through
 * the orchestrator and exposes the report history.
 */

import { ulid } from 'ulid';
import {
  InvalidPayloadError,
  RequestCancelledError,
  reportRequestInputSchema,
  type Content,
  type DeliveryResult,
  type DispatchRequest,
  type FinalArtifact,
  type HistoryEntry,
  type HistoryStore,
} from '@relaykit/core';
import type { DispatchConfig } from '../../config.js';
import { systemClock, type Clock } from '../clock.js';
import { createExcelFormatter, createPdfFormatter, HtmlFormatter } from '../formatters.js';
import { InMemoryHistoryStore } from '../history-store.js';
import { createLogger, type Logger } from '../logger.js';
import { Orchestrator, type RunOptions } from '../orchestrator.js';
import { parsePayload } from '../payload.js';
import { createEmptyRegistries, type Registries } from '../registry.js';
import { CloudDelivery, DownloadDelivery, EmailReportDelivery } from './delivery.js';
import { FinancialReportGenerator, InventoryReportGenerator, SalesReportGenerator } from './generators.js';

export interface ReportRequestInput {
  type: string;
  data: unknown;
  format: string;
  delivery: string;
  recipient?: string;
}

export function createReportRequest(input: ReportRequestInput, clock: Clock = systemClock): DispatchRequest {
  const parsed = parsePayload(reportRequestInputSchema, input, 'report request');
  if (parsed.data === undefined || parsed.data === null) {
    throw new InvalidPayloadError(`Report request for ${parsed.type} has no data`);
  }
  return Object.freeze({
    id: ulid(clock.now().getTime()),
    pipeline: 'report' as const,
    payload: parsed.data,
    routes: Object.freeze([
      Object.freeze({
        generator: parsed.type,
        formatter: parsed.format,
        delivery: parsed.delivery,
        recipient: parsed.recipient,
      }),
    ]),
  });
}

/** Registries pre-loaded with the built-in report kinds, formats and delivery methods */
export function createReportRegistries(config: DispatchConfig): Registries {
  const registries = createEmptyRegistries();
  registries.generators
    .register('sales', new SalesReportGenerator())
    .register('inventory', new InventoryReportGenerator())
    .register('financial', new FinancialReportGenerator());
  registries.formatters
    .register('pdf', createPdfFormatter())
    .register('excel', createExcelFormatter())
    .register('html', new HtmlFormatter());
  registries.deliveries
    .register('email', new EmailReportDelivery(config.reports.emailRecipient))
    .register('download', new DownloadDelivery(config.reports.downloadPath))
    .register('cloud', new CloudDelivery(config.reports.cloudBaseUrl));
  return registries;
}

export interface GeneratedReport {
  content: Content;
  artifact: FinalArtifact;
  result: DeliveryResult;
  entry: HistoryEntry;
}

export interface ReportSystemDeps {
  registries: Registries;
  history?: HistoryStore;
  clock?: Clock;
  logger?: Logger;
  deliveryTimeoutMs?: number;
}

export class ReportSystem {
  readonly registries: Registries;
  private readonly history: HistoryStore;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly orchestrator: Orchestrator;

  constructor(deps: ReportSystemDeps) {
    this.registries = deps.registries;
    this.history = deps.history ?? new InMemoryHistoryStore();
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger('ReportSystem');
    this.orchestrator = new Orchestrator({
      ...deps.registries,
      history: this.history,
      clock: this.clock,
      logger: this.log,
      deliveryTimeoutMs: deps.deliveryTimeoutMs,
    });
  }

  async generateReport(
    type: string,
    data: unknown,
    format: string,
    delivery: string,
    recipient?: string,
    options: RunOptions = {},
  ): Promise<GeneratedReport> {
    const request = createReportRequest({ type, data, format, delivery, recipient }, this.clock);
    this.log.info(`Generating ${type} report as ${format} via ${delivery}`, { requestId: request.id });

    const outcome = await this.orchestrator.run(request, options);
    const [content] = outcome.contents;
    const [artifact] = outcome.artifacts;
    const [result] = outcome.results;
    const [entry] = outcome.entries;
    if (!content || !artifact || !result || !entry) {
      // Only reachable when the run was cancelled before its single route started
      throw new RequestCancelledError(request.id);
    }
    return { content, artifact, result, entry };
  }

  getReportHistory(): readonly HistoryEntry[] {
    return this.history.all();
  }
}

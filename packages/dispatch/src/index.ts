/**
 * @relaykit/dispatch — report and order-notification pipelines
 */

import type { HistoryStore } from '@relaykit/core';
import { getConfig, validateConfig, type DispatchConfig } from './config.js';
import type { Clock } from './lib/clock.js';
import type { Logger } from './lib/logger.js';
import type { Registries } from './lib/registry.js';
import { createReportRegistries, ReportSystem } from './lib/reports/report-system.js';
import { createNotificationRegistries, OrderNotificationSystem } from './lib/notifications/order-notifications.js';

export { getConfig, validateConfig, type DispatchConfig, type ReportConfig, type NotificationConfig } from './config.js';
export { createLogger, type Logger, type LoggerOptions, type Level } from './lib/logger.js';
export { systemClock, fixedClock, formatDisplayTime, formatFileStamp, type Clock } from './lib/clock.js';
export { Registry, createEmptyRegistries, type Registries } from './lib/registry.js';
export { InMemoryHistoryStore } from './lib/history-store.js';
export { RequestTracker, canTransition, settleStatus } from './lib/request-state.js';
export { Orchestrator, type OrchestratorDeps, type RunOptions } from './lib/orchestrator.js';
export { parsePayload, round2, money } from './lib/payload.js';
export { EnvelopeFormatter, HtmlFormatter, PassthroughFormatter, createPdfFormatter, createExcelFormatter } from './lib/formatters.js';
export { SalesReportGenerator, InventoryReportGenerator, FinancialReportGenerator } from './lib/reports/generators.js';
export { EmailReportDelivery, DownloadDelivery, CloudDelivery } from './lib/reports/delivery.js';
export {
  ReportSystem,
  createReportRequest,
  createReportRegistries,
  type GeneratedReport,
  type ReportRequestInput,
  type ReportSystemDeps,
} from './lib/reports/report-system.js';
export {
  OrderMessageGenerator,
  createEmailMessageGenerator,
  createSmsMessageGenerator,
  createPushMessageGenerator,
  EMAIL_TEMPLATE,
  SMS_TEMPLATE,
  PUSH_TEMPLATE,
  type MessageTemplate,
} from './lib/notifications/messages.js';
export { EmailProvider } from './lib/notifications/providers/email.js';
export { SmsProvider, validatePhone } from './lib/notifications/providers/sms.js';
export { PushProvider, validateDeviceId } from './lib/notifications/providers/push.js';
export {
  OrderNotificationSystem,
  createOrderNotificationRequest,
  createNotificationRegistries,
  DEFAULT_CONTACTS,
  type ChannelRegistration,
  type ContactResolver,
  type OrderNotificationSystemDeps,
} from './lib/notifications/order-notifications.js';

export interface SystemOptions {
  config?: DispatchConfig;
  registries?: Registries;
  history?: HistoryStore;
  clock?: Clock;
  logger?: Logger;
}

function resolveConfig(options: SystemOptions): DispatchConfig {
  const config = options.config ?? getConfig();
  validateConfig(config);
  return config;
}

/**
 * Report system wired with the built-in kinds, formats and delivery methods.
 * Any collaborator can be replaced through options.
 */
export function createReportSystem(options: SystemOptions = {}): ReportSystem {
  const config = resolveConfig(options);
  return new ReportSystem({
    registries: options.registries ?? createReportRegistries(config),
    history: options.history,
    clock: options.clock,
    logger: options.logger,
    deliveryTimeoutMs: config.deliveryTimeoutMs,
  });
}

/**
 * Order notification system wired with the email, sms and push channels.
 */
export function createOrderNotificationSystem(options: SystemOptions = {}): OrderNotificationSystem {
  const config = resolveConfig(options);
  return new OrderNotificationSystem({
    registries: options.registries ?? createNotificationRegistries(config),
    history: options.history,
    clock: options.clock,
    logger: options.logger,
    deliveryTimeoutMs: config.deliveryTimeoutMs,
  });
}

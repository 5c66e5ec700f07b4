/**
 * Order notification facade
 *
 * Validates an order, maps each requested channel to the customer's contact
 * for that channel, and fans the request out through the orchestrator. A
 * failure on one channel leaves the others untouched.
 */

import { ulid } from 'ulid';
import {
  NOTIFICATION_CHANNELS,
  notificationChannelsSchema,
  orderPayloadSchema,
  type ContentGenerator,
  type Customer,
  type DeliveryStrategy,
  type DispatchOutcome,
  type DispatchRequest,
  type Formatter,
  type HistoryEntry,
  type HistoryStore,
  type Tag,
} from '@relaykit/core';
import type { DispatchConfig } from '../../config.js';
import { systemClock, type Clock } from '../clock.js';
import { PassthroughFormatter } from '../formatters.js';
import { InMemoryHistoryStore } from '../history-store.js';
import { createLogger, type Logger } from '../logger.js';
import { Orchestrator, type RunOptions } from '../orchestrator.js';
import { parsePayload } from '../payload.js';
import { createEmptyRegistries, type Registries } from '../registry.js';
import { createEmailMessageGenerator, createPushMessageGenerator, createSmsMessageGenerator } from './messages.js';
import { EmailProvider } from './providers/email.js';
import { PushProvider } from './providers/push.js';
import { SmsProvider } from './providers/sms.js';

export type ContactResolver = (customer: Customer) => string | undefined;

export const DEFAULT_CONTACTS: ReadonlyMap<Tag, ContactResolver> = new Map<Tag, ContactResolver>([
  ['email', (c) => c.email],
  ['sms', (c) => c.phone],
  ['push', (c) => c.deviceId],
]);

/**
 * Build the frozen fan-out request. Channels without a contact resolver get
 * no recipient; the registries decide whether the channel exists at all.
 */
export function createOrderNotificationRequest(
  orderData: unknown,
  channels: readonly string[],
  contacts: ReadonlyMap<Tag, ContactResolver> = DEFAULT_CONTACTS,
  clock: Clock = systemClock,
): DispatchRequest {
  const order = parsePayload(orderPayloadSchema, orderData, 'order');
  const tags = parsePayload(notificationChannelsSchema, channels, 'channel list');

  const routes = tags.map((channel) =>
    Object.freeze({
      generator: channel,
      formatter: channel,
      delivery: channel,
      recipient: contacts.get(channel)?.(order.customer),
    }),
  );

  return Object.freeze({
    id: ulid(clock.now().getTime()),
    pipeline: 'notification' as const,
    payload: order,
    routes: Object.freeze(routes),
    reference: order.orderId,
  });
}

/** Registries pre-loaded with the email, sms and push channels */
export function createNotificationRegistries(config: DispatchConfig): Registries {
  const registries = createEmptyRegistries();
  registries.generators
    .register('email', createEmailMessageGenerator())
    .register('sms', createSmsMessageGenerator(config.notifications.smsMaxLength))
    .register('push', createPushMessageGenerator());
  for (const channel of NOTIFICATION_CHANNELS) {
    registries.formatters.register(channel, new PassthroughFormatter(channel));
  }
  registries.deliveries
    .register('email', new EmailProvider(config.notifications.sender))
    .register('sms', new SmsProvider())
    .register('push', new PushProvider(config.notifications.pushDevicePrefix));
  return registries;
}

export interface ChannelRegistration {
  generator: ContentGenerator;
  delivery: DeliveryStrategy;
  /** Defaults to passing the generated message through */
  formatter?: Formatter;
  /** How to find the customer's address on this channel */
  contact?: ContactResolver;
}

export interface OrderNotificationSystemDeps {
  registries: Registries;
  history?: HistoryStore;
  clock?: Clock;
  logger?: Logger;
  deliveryTimeoutMs?: number;
}

export class OrderNotificationSystem {
  readonly registries: Registries;
  private readonly history: HistoryStore;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly orchestrator: Orchestrator;
  private readonly contacts = new Map<Tag, ContactResolver>(DEFAULT_CONTACTS);

  constructor(deps: OrderNotificationSystemDeps) {
    this.registries = deps.registries;
    this.history = deps.history ?? new InMemoryHistoryStore();
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger('OrderNotificationSystem');
    this.orchestrator = new Orchestrator({
      ...deps.registries,
      history: this.history,
      clock: this.clock,
      logger: this.log,
      deliveryTimeoutMs: deps.deliveryTimeoutMs,
    });
  }

  async processOrder(orderData: unknown, channels: readonly string[], options: RunOptions = {}): Promise<DispatchOutcome> {
    const request = createOrderNotificationRequest(orderData, channels, this.contacts, this.clock);
    this.log.info(`Processing order #${request.reference}`, { requestId: request.id, channels });

    const outcome = await this.orchestrator.run(request, options);
    const failed = outcome.results.filter((r) => !r.success).map((r) => r.method);
    if (failed.length > 0) {
      this.log.warn(`Order #${request.reference}: ${failed.length} channel(s) failed`, { failed });
    }
    return outcome;
  }

  /** Add or replace a channel across all three registries */
  registerChannel(channel: Tag, registration: ChannelRegistration): void {
    this.registries.generators.register(channel, registration.generator);
    this.registries.formatters.register(channel, registration.formatter ?? new PassthroughFormatter(channel));
    this.registries.deliveries.register(channel, registration.delivery);
    if (registration.contact) this.contacts.set(channel, registration.contact);
  }

  /** Channels with a registered delivery strategy */
  getAvailableChannels(): Tag[] {
    return this.registries.deliveries.tags();
  }

  getNotificationHistory(): readonly HistoryEntry[] {
    return this.history.all();
  }

  findByOrder(orderId: string): readonly HistoryEntry[] {
    return this.history.filterByOrder(orderId);
  }

  findByRecipient(substr: string): readonly HistoryEntry[] {
    return this.history.filterByRecipient(substr);
  }
}

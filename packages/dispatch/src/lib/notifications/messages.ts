/**
 * Order confirmation message generators, one template per channel.
 */

import {
  DEFAULT_SMS_MAX_LENGTH,
  orderPayloadSchema,
  type Content,
  type ContentGenerator,
  type GenerationContext,
  type OrderPayload,
  type Tag,
} from '@relaykit/core';
import { deepFreeze } from '../immutable.js';
import { money, parsePayload } from '../payload.js';

export type MessageTemplate = (order: OrderPayload) => string;

export const EMAIL_TEMPLATE: MessageTemplate = (order) =>
  `Dear ${order.customer.name}, your order #${order.orderId} for ${money(order.total)} has been confirmed. Thank you for your purchase.`;

export const SMS_TEMPLATE: MessageTemplate = (order) =>
  `Order #${order.orderId} confirmed. Total: ${money(order.total)}. Thank you!`;

export const PUSH_TEMPLATE: MessageTemplate = (order) =>
  `Order confirmed! #${order.orderId} - ${money(order.total)}`;

export class OrderMessageGenerator implements ContentGenerator {
  constructor(
    readonly kind: Tag,
    private readonly template: MessageTemplate,
    private readonly maxLength?: number,
  ) {}

  generate(payload: unknown, ctx: GenerationContext): Content {
    const order = parsePayload(orderPayloadSchema, payload, `${this.kind} message`);
    const message = this.template(order);
    // Cut on code points so a surrogate pair is never split
    const body = this.maxLength === undefined ? message : Array.from(message).slice(0, this.maxLength).join('');

    return deepFreeze<Content>({
      kind: this.kind,
      body,
      metadata: {
        orderId: order.orderId,
        customerName: order.customer.name,
        total: order.total,
        subject: `Order confirmation #${order.orderId}`,
      },
      generatedAt: ctx.now.toISOString(),
    });
  }
}

export function createEmailMessageGenerator(): OrderMessageGenerator {
  return new OrderMessageGenerator('email', EMAIL_TEMPLATE);
}

export function createSmsMessageGenerator(maxLength: number = DEFAULT_SMS_MAX_LENGTH): OrderMessageGenerator {
  return new OrderMessageGenerator('sms', SMS_TEMPLATE, maxLength);
}

export function createPushMessageGenerator(): OrderMessageGenerator {
  return new OrderMessageGenerator('push', PUSH_TEMPLATE);
}

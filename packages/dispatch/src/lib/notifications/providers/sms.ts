/**
 * SMS notification provider
 */

import {
  InvalidRecipientError,
  MIN_PHONE_LENGTH_EXCLUSIVE,
  getErrorMessage,
  type DeliveryResult,
  type DeliveryStrategy,
  type FinalArtifact,
} from '@relaykit/core';
import { createLogger, type Logger } from '../../logger.js';

export function validatePhone(phone: string | undefined): string {
  if (!phone || phone.length <= MIN_PHONE_LENGTH_EXCLUSIVE) {
    throw new InvalidRecipientError('Invalid phone number', phone);
  }
  return phone;
}

export class SmsProvider implements DeliveryStrategy {
  readonly method = 'sms';

  constructor(private readonly log: Logger = createLogger('SmsProvider')) {}

  async deliver(artifact: FinalArtifact, recipient: string | undefined): Promise<DeliveryResult> {
    let to: string;
    try {
      to = validatePhone(recipient);
    } catch (err) {
      const msg = getErrorMessage(err);
      this.log.warn(`SMS rejected: ${msg}`, { recipient });
      return { success: false, method: this.method, recipient, errorCode: 'INVALID_RECIPIENT', error: msg };
    }

    this.log.info(`SMS sent to ${to}`);
    return { success: true, method: this.method, recipient: to, receipt: { to, text: artifact.rendered } };
  }
}

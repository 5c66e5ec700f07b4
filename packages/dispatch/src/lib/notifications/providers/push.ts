/**
 * Push notification provider
 *
 * Builds the push payload the device service would receive.
 */

import {
  DEFAULT_PUSH_DEVICE_PREFIX,
  InvalidRecipientError,
  getErrorMessage,
  type DeliveryResult,
  type DeliveryStrategy,
  type FinalArtifact,
} from '@relaykit/core';
import { createLogger, type Logger } from '../../logger.js';

export function validateDeviceId(deviceId: string | undefined, prefix: string = DEFAULT_PUSH_DEVICE_PREFIX): string {
  if (!deviceId || !deviceId.startsWith(prefix)) {
    throw new InvalidRecipientError('Invalid device id', deviceId);
  }
  return deviceId;
}

export class PushProvider implements DeliveryStrategy {
  readonly method = 'push';

  constructor(
    private readonly devicePrefix: string = DEFAULT_PUSH_DEVICE_PREFIX,
    private readonly log: Logger = createLogger('PushProvider'),
  ) {}

  async deliver(artifact: FinalArtifact, recipient: string | undefined): Promise<DeliveryResult> {
    let to: string;
    try {
      to = validateDeviceId(recipient, this.devicePrefix);
    } catch (err) {
      const msg = getErrorMessage(err);
      this.log.warn(`Push rejected: ${msg}`, { recipient });
      return { success: false, method: this.method, recipient, errorCode: 'INVALID_RECIPIENT', error: msg };
    }

    const notification = { title: 'Order confirmed', body: artifact.rendered, sound: 'default' };
    this.log.info(`Push sent to device ${to}`);
    return { success: true, method: this.method, recipient: to, receipt: { to, notification } };
  }
}

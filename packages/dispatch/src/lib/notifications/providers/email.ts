/**
 * Email notification provider
 *
 * Wraps the message in a minimal HTML document. Transport is simulated and
 * the address is not checked, so every send succeeds.
 */

import type { DeliveryResult, DeliveryStrategy, FinalArtifact } from '@relaykit/core';
import { escapeHtml } from '../../html.js';
import { createLogger, type Logger } from '../../logger.js';

export class EmailProvider implements DeliveryStrategy {
  readonly method = 'email';

  constructor(
    private readonly sender: string,
    private readonly log: Logger = createLogger('EmailProvider'),
  ) {}

  async deliver(artifact: FinalArtifact, recipient: string | undefined): Promise<DeliveryResult> {
    const to = recipient ?? '';
    const subject = typeof artifact.metadata.subject === 'string' ? artifact.metadata.subject : `Notification: ${artifact.kind}`;
    const html = this.buildHtml(artifact.rendered);
    this.log.info(`Email sent to ${to}`, { subject });

    return {
      success: true,
      method: this.method,
      recipient: to,
      receipt: { from: this.sender, to, subject, html },
    };
  }

  private buildHtml(message: string): string {
    return `<html><body><p>${escapeHtml(message)}</p></body></html>`;
  }
}

/**
 * Report delivery strategies (email, download, cloud).
 *
 * Transport is simulated: each strategy works out where the report would go,
 * logs it, and reports success with a receipt describing the hand-off.
 */

import type { DeliveryContext, DeliveryResult, DeliveryStrategy, FinalArtifact } from '@relaykit/core';
import { formatFileStamp } from '../clock.js';
import { createLogger, type Logger } from '../logger.js';

function reportFileName(artifact: FinalArtifact, now: Date): string {
  return `${artifact.kind}_${formatFileStamp(now)}.${artifact.format}`;
}

export class EmailReportDelivery implements DeliveryStrategy {
  readonly method = 'email';

  constructor(
    private readonly defaultRecipient: string,
    private readonly log: Logger = createLogger('EmailReportDelivery'),
  ) {}

  async deliver(artifact: FinalArtifact, recipient: string | undefined): Promise<DeliveryResult> {
    const to = recipient ?? this.defaultRecipient;
    const subject = `Report: ${artifact.kind} (${artifact.format})`;
    this.log.info(`Emailing report to ${to}`, { subject, bytes: artifact.rendered.length });
    return { success: true, method: this.method, recipient: to, receipt: { to, subject } };
  }
}

export class DownloadDelivery implements DeliveryStrategy {
  readonly method = 'download';

  constructor(
    private readonly downloadPath: string,
    private readonly log: Logger = createLogger('DownloadDelivery'),
  ) {}

  async deliver(artifact: FinalArtifact, _recipient: string | undefined, ctx: DeliveryContext): Promise<DeliveryResult> {
    const path = `${this.downloadPath}/report_${reportFileName(artifact, ctx.now)}`;
    this.log.info(`Report available for download at ${path}`);
    return { success: true, method: this.method, receipt: { path } };
  }
}

export class CloudDelivery implements DeliveryStrategy {
  readonly method = 'cloud';

  constructor(
    private readonly baseUrl: string,
    private readonly log: Logger = createLogger('CloudDelivery'),
  ) {}

  async deliver(artifact: FinalArtifact, _recipient: string | undefined, ctx: DeliveryContext): Promise<DeliveryResult> {
    const url = `${this.baseUrl}/reports/${reportFileName(artifact, ctx.now)}`;
    this.log.info(`Report uploaded to ${url}`);
    return { success: true, method: this.method, receipt: { url } };
  }
}

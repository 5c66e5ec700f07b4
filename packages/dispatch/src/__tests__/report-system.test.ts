/**
 * End-to-end tests for the report facade
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InvalidPayloadError, RequestCancelledError, UnknownTagError, type ContentGenerator } from '@relaykit/core';
import { createReportSystem, getConfig } from '../index.js';
import { createReportRequest } from '../lib/reports/report-system.js';
import { createSpyLogger, inventoryPayload, muteLogOutput, salesPayload, testClock, testConfig, TEST_NOW } from './test-helpers.js';

describe('ReportSystem', () => {
  let restoreOutput: () => void;

  beforeEach(() => {
    restoreOutput = muteLogOutput();
  });

  afterEach(() => {
    restoreOutput();
  });

  function system() {
    return createReportSystem({ config: testConfig(), clock: testClock(), logger: createSpyLogger() });
  }

  it('generates, formats and emails a sales report', async () => {
    const reports = system();
    const { content, artifact, result, entry } = await reports.generateReport('sales', salesPayload, 'pdf', 'email');

    expect(content.metadata.total).toBe(1245.48);
    expect(artifact.rendered.startsWith('[PDF FORMAT]\n' + '='.repeat(60))).toBe(true);
    expect(artifact.rendered.endsWith('\n[END PDF]')).toBe(true);
    expect(result).toEqual({
      success: true,
      method: 'email',
      recipient: 'reports@example.com',
      receipt: { to: 'reports@example.com', subject: 'Report: sales (pdf)' },
    });
    expect(entry).toMatchObject({
      pipeline: 'report',
      kind: 'sales',
      format: 'pdf',
      deliveryMethod: 'email',
      recipient: 'reports@example.com',
      timestamp: TEST_NOW,
      outcome: 'success',
    });
    expect(reports.getReportHistory()).toEqual([entry]);
    expect(reports.getReportHistory()[0]?.metadata).toEqual({ total: 1245.48, count: 4, period: 'January 2024' });
  });

  it('keeps report aggregates in history', async () => {
    const reports = system();
    await reports.generateReport('inventory', inventoryPayload, 'excel', 'download');
    const [entry] = reports.getReportHistory();
    expect(entry?.metadata).toEqual({
      totalItems: 120,
      categoryCount: 4,
      categories: ['Computers', 'Accessories', 'displays', 'Displays'],
    });
  });

  it('downloads an inventory report as excel', async () => {
    const { result, entry } = await system().generateReport('inventory', inventoryPayload, 'excel', 'download');
    expect(result.receipt).toEqual({ path: './reports/report_inventory_20240131_093005.excel' });
    expect(entry.recipient).toBeUndefined();
  });

  it('emails an explicit recipient', async () => {
    const { entry } = await system().generateReport('sales', salesPayload, 'html', 'email', 'finance@example.com');
    expect(entry.recipient).toBe('finance@example.com');
    expect(entry.summary.startsWith('<html><body><pre>')).toBe(true);
  });

  it('rejects an unknown format without touching history', async () => {
    const reports = system();
    await expect(reports.generateReport('sales', salesPayload, 'docx', 'email')).rejects.toThrow(UnknownTagError);
    await expect(reports.generateReport('sales', salesPayload, 'docx', 'email')).rejects.toThrow('Unknown formatter tag: docx');
    expect(reports.getReportHistory()).toEqual([]);
  });

  it('rejects a report without data', async () => {
    const reports = system();
    await expect(reports.generateReport('sales', undefined, 'pdf', 'email')).rejects.toThrow(InvalidPayloadError);
    expect(reports.getReportHistory()).toEqual([]);
  });

  it('rejects a malformed payload without touching history', async () => {
    const reports = system();
    await expect(reports.generateReport('financial', { income: 10 }, 'pdf', 'cloud')).rejects.toThrow(
      'Invalid financial payload at expenses: Required',
    );
    expect(reports.getReportHistory()).toEqual([]);
  });

  it('throws RequestCancelledError for a request cancelled up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const reports = system();
    await expect(
      reports.generateReport('sales', salesPayload, 'pdf', 'email', undefined, { signal: controller.signal }),
    ).rejects.toThrow(RequestCancelledError);
    expect(reports.getReportHistory()).toEqual([]);
  });

  it('picks up a generator registered at runtime', async () => {
    const reports = system();
    const custom: ContentGenerator = {
      kind: 'custom',
      generate: (_payload, ctx) => ({ kind: 'custom', body: 'custom body', metadata: {}, generatedAt: ctx.now.toISOString() }),
    };
    reports.registries.generators.register('custom', custom);

    const { artifact, result } = await reports.generateReport('custom', {}, 'html', 'cloud');
    expect(artifact.rendered).toBe('<html><body><pre>custom body</pre></body></html>');
    expect(result.receipt).toEqual({ url: 'https://cloud.example.com/reports/custom_20240131_093005.html' });
  });

  it('returns equal history snapshots across reads', async () => {
    const reports = system();
    await reports.generateReport('sales', salesPayload, 'pdf', 'email');
    await reports.generateReport('inventory', inventoryPayload, 'excel', 'download');

    const first = reports.getReportHistory();
    const second = reports.getReportHistory();
    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(first.map((e) => e.kind)).toEqual(['sales', 'inventory']);
  });

  it('reads defaults from the environment config', async () => {
    const reports = createReportSystem({
      config: getConfig({ REPORT_EMAIL_RECIPIENT: 'ops@example.com' }),
      clock: testClock(),
      logger: createSpyLogger(),
    });
    const { result } = await reports.generateReport('sales', salesPayload, 'pdf', 'email');
    expect(result.recipient).toBe('ops@example.com');
  });
});

describe('createReportRequest', () => {
  it('builds a frozen single-route request', () => {
    const request = createReportRequest(
      { type: 'sales', data: salesPayload, format: 'pdf', delivery: 'email' },
      testClock(),
    );
    expect(request.pipeline).toBe('report');
    expect(request.routes).toEqual([{ generator: 'sales', formatter: 'pdf', delivery: 'email', recipient: undefined }]);
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.routes[0])).toBe(true);
  });

  it('rejects an empty selector', () => {
    expect(() => createReportRequest({ type: '', data: {}, format: 'pdf', delivery: 'email' }, testClock())).toThrow(
      'Invalid report request payload at type: String must contain at least 1 character(s)',
    );
  });
});

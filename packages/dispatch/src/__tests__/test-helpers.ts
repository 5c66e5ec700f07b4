/**
 * Shared fixtures for dispatch tests.
 */

import { vi, type Mock } from 'vitest';
import type { DeliveryResult, DeliveryStrategy, FinalArtifact } from '@relaykit/core';
import { getConfig, type DispatchConfig } from '../config.js';
import { fixedClock, type Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';

export const TEST_NOW = '2024-01-31T09:30:05.000Z';

export function testClock(): Clock {
  return fixedClock(TEST_NOW);
}

/** Defaults only; the ambient environment is ignored */
export function testConfig(): DispatchConfig {
  return getConfig({});
}

type LogFn = (msg: string, data?: unknown) => void;

export type SpyLogger = { [K in keyof Logger]: Mock<LogFn> };

export function createSpyLogger(): SpyLogger {
  return { debug: vi.fn<LogFn>(), info: vi.fn<LogFn>(), warn: vi.fn<LogFn>(), error: vi.fn<LogFn>() };
}

/** Mutes the JSON-lines loggers of strategies built with their default logger */
export function muteLogOutput(): () => void {
  const stdout = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
  const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
  return () => {
    stdout.mockRestore();
    stderr.mockRestore();
  };
}

/** Delivery strategy whose behaviour is supplied by the test */
export function stubDelivery(
  method: string,
  deliver: DeliveryStrategy['deliver'] = async (_artifact: FinalArtifact, recipient: string | undefined): Promise<DeliveryResult> =>
    ({ success: true, method, recipient }),
): DeliveryStrategy {
  return { method, deliver };
}

export const salesPayload = {
  period: 'January 2024',
  sales: [
    { product: 'Laptop', amount: 899.99 },
    { product: 'Mouse', amount: 25.5 },
    { product: 'Keyboard', amount: 120 },
    { product: 'Monitor', amount: 199.99 },
  ],
};

export const inventoryPayload = {
  items: [
    { name: 'Laptop', category: 'Computers', quantity: 15 },
    { name: 'Mouse', category: 'Accessories', quantity: 50 },
    { name: 'Keyboard', category: 'Accessories', quantity: 30 },
    { name: 'Monitor', category: 'displays', quantity: 20 },
    { name: 'Stand', category: 'Displays', quantity: 5 },
  ],
};

export const financialPayload = { income: 50000, expenses: 32000 };

export function orderPayload(overrides: { phone?: string; deviceId?: string; orderId?: string } = {}) {
  return {
    orderId: overrides.orderId ?? 'ORD-001',
    customer: {
      name: 'Test Customer',
      email: 'customer@example.com',
      phone: overrides.phone ?? '+1-555-010-0199',
      deviceId: overrides.deviceId ?? 'DEVICE-ABC-123',
    },
    total: 150.5,
  };
}

/**
 * Dispatch configuration — reads from environment variables with sensible defaults.
 */

import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_DELIVERY_TIMEOUT_MS,
  DEFAULT_PUSH_DEVICE_PREFIX,
  DEFAULT_SMS_MAX_LENGTH,
} from '@relaykit/core';
import { createLogger } from './lib/logger.js';

const log = createLogger('Config');

export interface ReportConfig {
  /** Recipient for emailed reports when the request names none (default: 'reports@example.com') */
  emailRecipient: string;
  /** Directory prefix for downloadable reports (default: './reports') */
  downloadPath: string;
  /** Base URL reports are uploaded under (default: 'https://cloud.example.com') */
  cloudBaseUrl: string;
}

export interface NotificationConfig {
  /** SMS messages are cut to this many characters (default: 160) */
  smsMaxLength: number;
  /** Prefix a push recipient must carry (default: 'DEVICE-') */
  pushDevicePrefix: string;
  /** From address on notification emails (default: 'orders@example.com') */
  sender: string;
}

export interface DispatchConfig {
  /** Upper bound for a single delivery attempt (default: 10000) */
  deliveryTimeoutMs: number;
  reports: ReportConfig;
  notifications: NotificationConfig;
}

function intFromEnv(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw ?? '', 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): DispatchConfig {
  return {
    deliveryTimeoutMs: intFromEnv(env['DELIVERY_TIMEOUT_MS'], DEFAULT_DELIVERY_TIMEOUT_MS),
    reports: {
      emailRecipient: env['REPORT_EMAIL_RECIPIENT'] || 'reports@example.com',
      downloadPath: env['REPORT_DOWNLOAD_PATH'] || './reports',
      cloudBaseUrl: (env['REPORT_CLOUD_BASE_URL'] || 'https://cloud.example.com').replace(/\/+$/, ''),
    },
    notifications: {
      smsMaxLength: intFromEnv(env['SMS_MAX_LENGTH'], DEFAULT_SMS_MAX_LENGTH),
      pushDevicePrefix: env['PUSH_DEVICE_PREFIX'] ?? DEFAULT_PUSH_DEVICE_PREFIX,
      sender: env['NOTIFICATION_SENDER'] || 'orders@example.com',
    },
  };
}

/**
 * Validate config at startup. Logs warnings and throws on fatal misconfigurations.
 */
export function validateConfig(config: DispatchConfig): void {
  if (config.deliveryTimeoutMs <= 0) {
    throw new ConfigError(`DELIVERY_TIMEOUT_MS must be positive, got ${config.deliveryTimeoutMs}`);
  }
  if (config.notifications.smsMaxLength <= 0) {
    throw new ConfigError(`SMS_MAX_LENGTH must be positive, got ${config.notifications.smsMaxLength}`);
  }
  if (!config.notifications.pushDevicePrefix) {
    throw new ConfigError('PUSH_DEVICE_PREFIX must not be empty');
  }
  if (!z.string().url().safeParse(config.reports.cloudBaseUrl).success) {
    throw new ConfigError(`REPORT_CLOUD_BASE_URL is not a valid URL: '${config.reports.cloudBaseUrl}'`);
  }

  if (config.deliveryTimeoutMs > 60_000) {
    log.warn(`DELIVERY_TIMEOUT_MS=${config.deliveryTimeoutMs} holds a request for over a minute per route`);
  }
  if (config.notifications.smsMaxLength > DEFAULT_SMS_MAX_LENGTH) {
    log.warn(`SMS_MAX_LENGTH=${config.notifications.smsMaxLength} exceeds a single ${DEFAULT_SMS_MAX_LENGTH}-character segment`);
  }
}

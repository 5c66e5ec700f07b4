/**
 * @relaykit/core — Shared Constants
 */

/** Report kinds registered by default */
export const REPORT_KINDS = ['sales', 'inventory', 'financial'] as const;

/** Report output formats registered by default */
export const REPORT_FORMATS = ['pdf', 'excel', 'html'] as const;

/** Report delivery methods registered by default */
export const REPORT_DELIVERY_METHODS = ['email', 'download', 'cloud'] as const;

/** Notification channels registered by default */
export const NOTIFICATION_CHANNELS = ['email', 'sms', 'push'] as const;

export type ReportKind = (typeof REPORT_KINDS)[number];
export type ReportFormat = (typeof REPORT_FORMATS)[number];
export type ReportDeliveryMethod = (typeof REPORT_DELIVERY_METHODS)[number];
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

/** Default SMS length limit (one GSM segment) */
export const DEFAULT_SMS_MAX_LENGTH = 160;

/** Push recipients must start with this prefix unless configured otherwise */
export const DEFAULT_PUSH_DEVICE_PREFIX = 'DEVICE-';

/** An SMS recipient must be longer than this many characters */
export const MIN_PHONE_LENGTH_EXCLUSIVE = 10;

/** Default upper bound for one delivery attempt */
export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;

/** Length of the rendered-artifact slice kept on each history entry */
export const HISTORY_SUMMARY_LENGTH = 500;

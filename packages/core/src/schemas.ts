/**
 * @relaykit/core — Zod Validation Schemas
 *
 * Runtime validation for generator payloads and request selectors.
 */
import { z } from 'zod';

const tagSchema = z.string().min(1);

// ─── Report Payloads ───────────────────────────────────────────────

export const saleItemSchema = z.object({
  product: z.string(),
  amount: z.number().finite(),
});

export const salesPayloadSchema = z.object({
  period: z.string().optional(),
  sales: z.array(saleItemSchema),
});

export const inventoryItemSchema = z.object({
  name: z.string(),
  category: z.string(),
  quantity: z.number().finite(),
});

export const inventoryPayloadSchema = z.object({
  items: z.array(inventoryItemSchema),
});

export const financialPayloadSchema = z.object({
  income: z.number().finite(),
  expenses: z.number().finite(),
});

// ─── Order Payloads ────────────────────────────────────────────────

export const customerSchema = z.object({
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  deviceId: z.string(),
});

export const orderPayloadSchema = z.object({
  /** Numeric ids are accepted and carried as strings */
  orderId: z.union([z.string(), z.number().finite()]).transform(String),
  customer: customerSchema,
  total: z.number().finite().min(0),
  items: z.array(z.record(z.unknown())).optional(),
});

// ─── Request Selectors ─────────────────────────────────────────────

export const reportRequestInputSchema = z.object({
  type: tagSchema,
  data: z.unknown(),
  format: tagSchema,
  delivery: tagSchema,
  recipient: z.string().min(1).optional(),
});

export const notificationChannelsSchema = z.array(tagSchema).min(1);

export type SalesPayload = z.infer<typeof salesPayloadSchema>;
export type InventoryPayload = z.infer<typeof inventoryPayloadSchema>;
export type FinancialPayload = z.infer<typeof financialPayloadSchema>;
export type OrderPayload = z.infer<typeof orderPayloadSchema>;
export type ReportRequestInput = z.infer<typeof reportRequestInputSchema>;

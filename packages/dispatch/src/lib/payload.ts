import type { z } from 'zod';
import { InvalidPayloadError } from '@relaykit/core';

/**
 * Parse a generator payload, turning zod failures into InvalidPayloadError
 * with the issue list as details.
 */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, kind: string): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new InvalidPayloadError(
      `Invalid ${kind} payload${where}: ${first?.message ?? 'unrecognized shape'}`,
      parsed.error.issues,
    );
  }
  return parsed.data;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** `$1234.50`, `-$12.00` */
export function money(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

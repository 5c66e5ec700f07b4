/**
 * Report content generators — one per report kind.
 *
 * Each validates its payload, computes its aggregates, and lays out a
 * plain-text body. No side effects.
 */

import {
  financialPayloadSchema,
  inventoryPayloadSchema,
  salesPayloadSchema,
  type Content,
  type ContentGenerator,
  type GenerationContext,
} from '@relaykit/core';
import { formatDisplayTime } from '../clock.js';
import { deepFreeze } from '../immutable.js';
import { money, parsePayload, round2 } from '../payload.js';

const RULE = '='.repeat(60);
const DIVIDER = '-'.repeat(60);

function header(title: string, now: Date): string[] {
  return [RULE, `           ${title}`, RULE, `Generated: ${formatDisplayTime(now)}`, ''];
}

export class SalesReportGenerator implements ContentGenerator {
  readonly kind = 'sales';

  generate(payload: unknown, ctx: GenerationContext): Content {
    const data = parsePayload(salesPayloadSchema, payload, this.kind);
    const total = round2(data.sales.reduce((sum, item) => sum + item.amount, 0));
    const count = data.sales.length;

    const lines = [
      ...header('SALES REPORT', ctx.now),
      `Total sales: ${money(total)}`,
      `Transactions: ${count}`,
    ];
    if (data.period) lines.push(`Period: ${data.period}`);
    lines.push('', 'Sales detail:', DIVIDER);
    for (const sale of data.sales) {
      lines.push(`  • Product: ${sale.product} - ${money(sale.amount)}`);
    }

    const metadata: Record<string, unknown> = { total, count };
    if (data.period) metadata.period = data.period;

    return deepFreeze<Content>({ kind: this.kind, body: lines.join('\n'), metadata, generatedAt: ctx.now.toISOString() });
  }
}

export class InventoryReportGenerator implements ContentGenerator {
  readonly kind = 'inventory';

  generate(payload: unknown, ctx: GenerationContext): Content {
    const data = parsePayload(inventoryPayloadSchema, payload, this.kind);
    const totalItems = data.items.reduce((sum, item) => sum + item.quantity, 0);
    // Set keeps first-seen order; comparison is case-sensitive
    const categories = [...new Set(data.items.map((item) => item.category))];

    const lines = [
      ...header('INVENTORY REPORT', ctx.now),
      `Total items: ${totalItems}`,
      `Categories: ${categories.length}`,
      '',
      'Current stock:',
      DIVIDER,
      ...data.items.map((item) => `  • ${item.name} (${item.category}): ${item.quantity} units`),
    ];

    return deepFreeze<Content>({
      kind: this.kind,
      body: lines.join('\n'),
      metadata: { totalItems, categoryCount: categories.length, categories },
      generatedAt: ctx.now.toISOString(),
    });
  }
}

export class FinancialReportGenerator implements ContentGenerator {
  readonly kind = 'financial';

  generate(payload: unknown, ctx: GenerationContext): Content {
    const { income, expenses } = parsePayload(financialPayloadSchema, payload, this.kind);
    const balance = income - expenses;

    const lines = [
      ...header('FINANCIAL REPORT', ctx.now),
      `Income: ${money(income)}`,
      `Expenses: ${money(expenses)}`,
      `Balance: ${money(balance)}`,
    ];

    return deepFreeze<Content>({
      kind: this.kind,
      body: lines.join('\n'),
      metadata: { income, expenses, balance },
      generatedAt: ctx.now.toISOString(),
    });
  }
}

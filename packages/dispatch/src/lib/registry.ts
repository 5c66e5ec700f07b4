/**
 * Tag → implementation registry.
 *
 * One instance per category (generators, formatters, delivery strategies).
 * Registration overwrites; the next resolve sees the latest instance.
 */

import {
  UnknownTagError,
  type ContentGenerator,
  type DeliveryStrategy,
  type Formatter,
  type RegistryCategory,
  type Tag,
} from '@relaykit/core';

export class Registry<T> {
  private entries: Map<Tag, T>;

  constructor(
    readonly category: RegistryCategory,
    initial: Iterable<readonly [Tag, T]> = [],
  ) {
    this.entries = new Map(initial);
  }

  register(tag: Tag, implementation: T): this {
    this.entries.set(tag, implementation);
    return this;
  }

  resolve(tag: Tag): T {
    const implementation = this.entries.get(tag);
    if (implementation === undefined) {
      throw new UnknownTagError(this.category, tag);
    }
    return implementation;
  }

  has(tag: Tag): boolean {
    return this.entries.has(tag);
  }

  /** Registered tags in first-registration order */
  tags(): Tag[] {
    return [...this.entries.keys()];
  }
}

export interface Registries {
  generators: Registry<ContentGenerator>;
  formatters: Registry<Formatter>;
  deliveries: Registry<DeliveryStrategy>;
}

export function createEmptyRegistries(): Registries {
  return {
    generators: new Registry<ContentGenerator>('generator'),
    formatters: new Registry<Formatter>('formatter'),
    deliveries: new Registry<DeliveryStrategy>('delivery'),
  };
}

import {
  DIMENSION_CODES,
  SOURCE_CODES,
  type Dimension,
  type SourceId,
} from '../schema/vocabulary.js';
import type { CanonicalRecord } from '../normalize/types.js';

export interface IdentifiedRecord extends CanonicalRecord {
  id: string;
  /** Period label of the registry that issued the ID (`current`, `previous`). */
  period: string;
}

/** Read-only lookup the citation validator and footer work against. */
export interface CitationResolver {
  resolve(id: string): IdentifiedRecord | undefined;
  ids(): string[];
  records(): IdentifiedRecord[];
  readonly size: number;
}

export interface IdRegistryOptions {
  /** Prepended to every ID, e.g. `PREV` gives `PREV-GA4-DEV-001`. */
  prefix?: string;
  period?: string;
}

export const CURRENT_PERIOD = 'current';
export const COMPARISON_PERIOD = 'previous';
export const COMPARISON_PREFIX = 'PREV';

const PREFIX_PATTERN = /^[A-Z]+$/;
const SEQUENCE_WIDTH = 3;

/**
 * Run-scoped ID issuer. Counters are per (source, dimension) and only ever
 * move forward, so IDs are reproducible for a reproducible input order and
 * never reused.
 */
export class IdRegistry implements CitationResolver {
  readonly prefix: string | undefined;
  readonly period: string;
  private counters = new Map<string, number>();
  private byId = new Map<string, IdentifiedRecord>();

  constructor(options: IdRegistryOptions = {}) {
    if (options.prefix !== undefined && !PREFIX_PATTERN.test(options.prefix)) {
      throw new Error(`Registry prefix must be uppercase letters, got "${options.prefix}"`);
    }
    this.prefix = options.prefix;
    this.period = options.period ?? CURRENT_PERIOD;
  }

  get size(): number {
    return this.byId.size;
  }

  assign(record: CanonicalRecord): string {
    return this.register(record).id;
  }

  /** Assign an ID and return the identified record. */
  register(record: CanonicalRecord): IdentifiedRecord {
    const scope = `${record.source}:${record.dimension}`;
    const next = (this.counters.get(scope) ?? 0) + 1;
    this.counters.set(scope, next);

    const id = formatId(record.source, record.dimension, next, this.prefix);
    const identified: IdentifiedRecord = { ...record, id, period: this.period };
    this.byId.set(id, identified);
    return identified;
  }

  registerAll(records: CanonicalRecord[]): IdentifiedRecord[] {
    return records.map(record => this.register(record));
  }

  resolve(id: string): IdentifiedRecord | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  records(): IdentifiedRecord[] {
    return [...this.byId.values()];
  }
}

export function formatId(
  source: SourceId,
  dimension: Dimension,
  sequence: number,
  prefix?: string,
): string {
  const body = `${SOURCE_CODES[source]}-${DIMENSION_CODES[dimension]}-${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
  return prefix ? `${prefix}-${body}` : body;
}

/**
 * Resolves across the per-period registries of one run. Registries stay
 * disjoint: two with the same prefix are rejected.
 */
export class RegistryGroup implements CitationResolver {
  private readonly registries: IdRegistry[];

  constructor(registries: IdRegistry[]) {
    const prefixes = new Set<string>();
    for (const registry of registries) {
      const key = registry.prefix ?? '';
      if (prefixes.has(key)) {
        throw new Error(`Registries must have distinct prefixes; "${key || '(none)'}" appears twice`);
      }
      prefixes.add(key);
    }
    this.registries = registries;
  }

  get size(): number {
    return this.registries.reduce((sum, r) => sum + r.size, 0);
  }

  resolve(id: string): IdentifiedRecord | undefined {
    for (const registry of this.registries) {
      const record = registry.resolve(id);
      if (record) return record;
    }
    return undefined;
  }

  ids(): string[] {
    return this.registries.flatMap(r => r.ids());
  }

  records(): IdentifiedRecord[] {
    return this.registries.flatMap(r => r.records());
  }

  /** The registry for a period label, if the run has one. */
  forPeriod(period: string): IdRegistry | undefined {
    return this.registries.find(r => r.period === period);
  }
}

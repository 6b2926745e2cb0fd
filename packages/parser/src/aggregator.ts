import type {
  AggregateRecord,
  AllocationEvent,
  GroupingMode,
  OrderSample,
  OrderTotals,
} from './types.js';

/**
 * `total + pages`, refusing sums past 2^53 - 1 where page counts stop being
 * exact.
 */
export function addPages(total: number, pages: number): number {
  const sum = total + pages;
  if (!Number.isSafeInteger(sum)) {
    throw new RangeError(`Page total ${total} + ${pages} is beyond exact integer range`);
  }
  return sum;
}

/**
 * Folds allocation events into count/page totals keyed by module, or by
 * module and order. One instance per run; records() is meaningful only once
 * the whole input has been added.
 */
export class AllocationAggregator {
  private readonly table = new Map<string, AggregateRecord>();

  constructor(readonly mode: GroupingMode) {}

  add(event: AllocationEvent): void {
    const key = this.keyOf(event);
    let record = this.table.get(key);
    if (!record) {
      record = this.mode === 'module-order'
        ? { module: event.module, order: event.order, count: 0, pages: 0 }
        : { module: event.module, count: 0, pages: 0 };
      this.table.set(key, record);
    }
    record.count += 1;
    record.pages = addPages(record.pages, event.pageCount);
  }

  addAll(events: Iterable<AllocationEvent>): this {
    for (const event of events) this.add(event);
    return this;
  }

  get size(): number {
    return this.table.size;
  }

  /** Snapshot of the table, in no particular order. */
  records(): AggregateRecord[] {
    return Array.from(this.table.values(), (r) => ({ ...r }));
  }

  private keyOf(event: AllocationEvent): string {
    // NUL cannot occur in a module identifier, so the pair key is unambiguous.
    return this.mode === 'module-order' ? `${event.module}\0${event.order}` : event.module;
  }
}

/**
 * Per-order page totals with a grand total, independent of module.
 */
export class OrderTotalsAggregator {
  private readonly pagesByOrder = new Map<number, number>();
  private totalPages = 0;
  private skippedLines = 0;

  add(sample: OrderSample): void {
    this.pagesByOrder.set(sample.order, addPages(this.pagesByOrder.get(sample.order) ?? 0, sample.pageCount));
    this.totalPages = addPages(this.totalPages, sample.pageCount);
  }

  addAll(samples: Iterable<OrderSample>): this {
    for (const sample of samples) this.add(sample);
    return this;
  }

  skip(): void {
    this.skippedLines++;
  }

  totals(): OrderTotals {
    return {
      orders: Array.from(this.pagesByOrder.entries())
        .sort((a, b) => a[0] - b[0])
        .map(([order, pages]) => ({ order, pages })),
      totalPages: this.totalPages,
      skippedLines: this.skippedLines,
    };
  }
}

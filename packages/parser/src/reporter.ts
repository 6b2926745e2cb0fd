import type { AggregateRecord, OrderTotals } from './types.js';

export const PAGE_SIZE_KB = 4;

const COLUMN_WIDTH = 10;

export function toKilobytes(pages: number): number {
  return pages * PAGE_SIZE_KB;
}

function right(value: string | number, width = COLUMN_WIDTH): string {
  return String(value).padStart(width);
}

function left(value: string, width = COLUMN_WIDTH): string {
  return value.padEnd(width);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ============================================================
// Sort rules
// ============================================================

export function compareByPagesDesc(a: AggregateRecord, b: AggregateRecord): number {
  return b.pages - a.pages;
}

export function compareByModuleThenOrder(a: AggregateRecord, b: AggregateRecord): number {
  return compareText(a.module, b.module) || (a.order ?? 0) - (b.order ?? 0);
}

export function sortByModule(records: AggregateRecord[]): AggregateRecord[] {
  return [...records].sort(compareByPagesDesc);
}

export function sortByModuleAndOrder(records: AggregateRecord[]): AggregateRecord[] {
  return [...records].sort(compareByModuleThenOrder);
}

// ============================================================
// Text tables
// ============================================================

/**
 * by-module table, largest page total first.
 */
export function renderModuleReport(records: AggregateRecord[]): string[] {
  const header = [right('Count'), right('Pages'), right('Kbytes'), right('Module')].join(' ');
  const rows = sortByModule(records).map((r) =>
    [right(r.count), right(r.pages), right(toKilobytes(r.pages)), left(r.module)].join(' ')
  );
  return [header, ...rows];
}

/**
 * by-module-and-order table, grouped by module with ascending orders.
 */
export function renderModuleOrderReport(records: AggregateRecord[]): string[] {
  const header = [right('Count'), right('Pages'), right('Kbytes'), right('Order'), right('Module')].join(' ');
  const rows = sortByModuleAndOrder(records).map((r) =>
    [
      right(r.count),
      right(r.pages),
      right(toKilobytes(r.pages)),
      right(r.order ?? 0),
      left(r.module),
    ].join(' ')
  );
  return [header, ...rows];
}

export function renderOrderReport(totals: OrderTotals): string[] {
  const rows = totals.orders.map(
    (o) => `Order ${right(o.order, 3)} ${right(o.pages)} pages (${right(toKilobytes(o.pages), 11)} KB)`
  );
  rows.push(
    `Total ${right(totals.totalPages, 14)} pages (${right(toKilobytes(totals.totalPages), 11)} KB)`
  );
  return rows;
}

import { describe, it, expect } from 'vitest';
import {
  compareByModuleThenOrder,
  renderModuleOrderReport,
  renderModuleReport,
  renderOrderReport,
  sortByModule,
  sortByModuleAndOrder,
  toKilobytes,
} from '../src/reporter.js';
import { AllocationAggregator } from '../src/aggregator.js';
import { parseAllocationEvents } from '../src/page-owner-parser.js';
import type { AggregateRecord } from '../src/types.js';

const MODULE_HEADER = '     Count      Pages     Kbytes     Module';
const MODULE_ORDER_HEADER = '     Count      Pages     Kbytes      Order     Module';

describe('toKilobytes', () => {
  it('should use 4 KiB pages', () => {
    expect(toKilobytes(0)).toBe(0);
    expect(toKilobytes(3)).toBe(12);
  });
});

describe('renderModuleReport', () => {
  it('should render only the header for no records', () => {
    expect(renderModuleReport([])).toEqual([MODULE_HEADER]);
  });

  it('should render the two-block vmxnet3 dump as one row', () => {
    const dump = [
      'Page allocated via order 0, ...',
      'stack_line',
      'consumed_by [vmxnet3]',
      '',
      'Page allocated via order 0, ...',
      'stack_line',
      'consumed_by [vmxnet3]',
    ];
    const records = new AllocationAggregator('module').addAll(parseAllocationEvents(dump)).records();

    expect(records).toEqual([{ module: 'vmxnet3', count: 2, pages: 2 }]);
    expect(renderModuleReport(records)).toEqual([
      MODULE_HEADER,
      '         2          2          8 vmxnet3   ',
    ]);
  });

  it('should sort rows by pages descending and keep ties stable', () => {
    const records: AggregateRecord[] = [
      { module: 'small', count: 1, pages: 1 },
      { module: 'big', count: 2, pages: 64 },
      { module: 'tie_a', count: 4, pages: 4 },
      { module: 'tie_b', count: 1, pages: 4 },
    ];

    expect(renderModuleReport(records).slice(1)).toEqual([
      '         2         64        256 big       ',
      '         4          4         16 tie_a     ',
      '         1          4         16 tie_b     ',
      '         1          1          4 small     ',
    ]);
  });

  it('should not pad module names longer than the column', () => {
    const [, row] = renderModuleReport([{ module: 'nvidia_modeset', count: 1, pages: 2 }]);
    expect(row).toBe('         1          2          8 nvidia_modeset');
  });
});

describe('renderModuleOrderReport', () => {
  it('should render only the header for no records', () => {
    expect(renderModuleOrderReport([])).toEqual([MODULE_ORDER_HEADER]);
  });

  it('should group rows by module with ascending numeric orders', () => {
    const records: AggregateRecord[] = [
      { module: 'xfs', order: 10, count: 1, pages: 1024 },
      { module: 'ext4', order: 2, count: 1, pages: 4 },
      { module: 'xfs', order: 2, count: 3, pages: 12 },
      { module: 'ext4', order: 0, count: 5, pages: 5 },
    ];

    expect(renderModuleOrderReport(records)).toEqual([
      MODULE_ORDER_HEADER,
      '         5          5         20          0 ext4      ',
      '         1          4         16          2 ext4      ',
      '         3         12         48          2 xfs       ',
      '         1       1024       4096         10 xfs       ',
    ]);
  });

  it('should compare module names by code unit, not locale', () => {
    const sorted = sortByModuleAndOrder([
      { module: 'b', order: 0, count: 1, pages: 1 },
      { module: 'B', order: 0, count: 1, pages: 1 },
      { module: '_a', order: 0, count: 1, pages: 1 },
    ]);
    expect(sorted.map((r) => r.module)).toEqual(['B', '_a', 'b']);
  });
});

describe('sort invariants', () => {
  const records: AggregateRecord[] = [
    { module: 'm2', order: 1, count: 1, pages: 2 },
    { module: 'm1', order: 3, count: 2, pages: 16 },
    { module: 'm2', order: 0, count: 7, pages: 7 },
    { module: 'm1', order: 0, count: 1, pages: 1 },
  ];

  it('should never increase pages between adjacent by-module rows', () => {
    const sorted = sortByModule(records);
    for (let i = 1; i < sorted.length; i++) {
      expect(sorted[i - 1].pages).toBeGreaterThanOrEqual(sorted[i].pages);
    }
  });

  it('should keep each module contiguous in the by-module-and-order rows', () => {
    const sorted = [...records].sort(compareByModuleThenOrder);
    expect(sorted.map((r) => `${r.module}/${r.order}`)).toEqual(['m1/0', 'm1/3', 'm2/0', 'm2/1']);
  });

  it('should not mutate its input', () => {
    const copy = records.map((r) => ({ ...r }));
    sortByModule(records);
    sortByModuleAndOrder(records);
    expect(records).toEqual(copy);
  });
});

describe('renderOrderReport', () => {
  it('should render only the total for no orders', () => {
    expect(renderOrderReport({ orders: [], totalPages: 0, skippedLines: 0 })).toEqual([
      'Total              0 pages (          0 KB)',
    ]);
  });

  it('should render one row per order and the total', () => {
    const lines = renderOrderReport({
      orders: [
        { order: 0, pages: 3 },
        { order: 9, pages: 512 },
      ],
      totalPages: 515,
      skippedLines: 0,
    });

    expect(lines).toEqual([
      'Order   0          3 pages (         12 KB)',
      'Order   9        512 pages (       2048 KB)',
      'Total            515 pages (       2060 KB)',
    ]);
  });
});

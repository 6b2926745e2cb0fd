import { describe, it, expect } from 'vitest';
import { buildReportSet, isReportView, renderReportView } from '../src/report-set.js';

const DUMP = [
  'Page allocated via order 1, mask 0xcc0(GFP_KERNEL), pid 5, tgid 5 (insmod), ts 10 ns',
  ' post_alloc_hook+0x1',
  ' xfs_alloc+0x4 [xfs]',
  '',
  'Page allocated via order 0, mask 0xcc0(GFP_KERNEL), pid 5, tgid 5 (insmod), ts 11 ns',
  ' ext4_alloc+0x4 [ext4]',
  '',
  'Page allocated via order 1, mask 0xcc0(GFP_KERNEL), pid 6, tgid 6 (bash), ts 12 ns',
  ' xfs_alloc+0x4 [xfs]',
  '',
  'Page allocated via order 3, mask 0xcc0(GFP_KERNEL), pid 6, tgid 6 (bash), ts 13 ns',
  ' no_module_here+0x1',
  '',
].join('\n');

const OPTIONS = { unit: 'K' as const, topN: 10, callTraceTopN: 5 };

describe('buildReportSet', () => {
  const set = buildReportSet(DUMP);

  it('should build the by-module records sorted by pages', () => {
    expect(set.modules).toEqual([
      { module: 'xfs', count: 2, pages: 4 },
      { module: 'ext4', count: 1, pages: 1 },
    ]);
  });

  it('should build the by-module-and-order records sorted by module', () => {
    expect(set.moduleOrders).toEqual([
      { module: 'ext4', order: 0, count: 1, pages: 1 },
      { module: 'xfs', order: 1, count: 2, pages: 4 },
    ]);
  });

  it('should count every Page line in the order totals', () => {
    expect(set.orders).toEqual({
      orders: [
        { order: 0, pages: 1 },
        { order: 1, pages: 4 },
        { order: 3, pages: 8 },
      ],
      totalPages: 13,
      skippedLines: 0,
    });
  });

  it('should record parse statistics', () => {
    expect(set.parseStats).toEqual({
      blocks: 4,
      events: 3,
      skipped: { missingOrder: 0, missingModule: 1 },
    });
    expect(set.totalLines).toBe(12);
    expect(set.analysis.totalAllocations).toBe(4);
  });

  it('should leave every report empty for empty input', () => {
    const empty = buildReportSet('');
    expect(empty.modules).toEqual([]);
    expect(empty.moduleOrders).toEqual([]);
    expect(empty.orders.totalPages).toBe(0);
    expect(renderReportView(empty, 'orders', OPTIONS)).toEqual(['Total              0 pages (          0 KB)']);
  });

  it('should double every total over duplicated input', () => {
    const doubled = buildReportSet(DUMP + '\n' + DUMP);
    expect(doubled.modules).toEqual(set.modules.map((r) => ({ ...r, count: r.count * 2, pages: r.pages * 2 })));
    expect(doubled.orders.totalPages).toBe(set.orders.totalPages * 2);
  });
});

describe('renderReportView', () => {
  const set = buildReportSet(DUMP);

  it('should render the module view', () => {
    expect(renderReportView(set, 'modules', OPTIONS)).toEqual([
      '     Count      Pages     Kbytes     Module',
      '         2          4         16 xfs       ',
      '         1          1          4 ext4      ',
    ]);
  });

  it('should render the analysis view with all sections', () => {
    const lines = renderReportView(set, 'analysis', OPTIONS);
    expect(lines[0]).toBe('Top 10 Processes:');
    expect(lines).toContain('Top 10 Modules:');
    expect(lines).toContain('Top 5 Call Traces:');
    expect(lines[lines.length - 3]).toBe('Total skipped: 0');
  });

  it('should render the slabs view with every split table', () => {
    const lines = renderReportView(set, 'slabs', OPTIONS);
    expect(lines[0]).toBe('Top 10 Slab Functions:');
    expect(lines).toContain('Order     Slabs (kB)          Non Slabs (kB)      Total (kB)');
    expect(lines).toContain('Application         Slabs (kB)          Non Slabs (kB)      Total (kB)');
    expect(lines[lines.length - 1]).toBe('Total               0.00 kB             52.00 kB            52.00 kB');
  });
});

describe('isReportView', () => {
  it('should accept only known views', () => {
    expect(isReportView('module-order')).toBe(true);
    expect(isReportView('slabs')).toBe(true);
    expect(isReportView('summary')).toBe(false);
  });
});

import type { PageOwnerReportSet, RenderOptions, ReportView } from './types.js';
import { AllocationAggregator, OrderTotalsAggregator } from './aggregator.js';
import { createParseStats, parseAllocationEvents, parseOrderSamples, splitLines } from './page-owner-parser.js';
import {
  analyzePageOwner,
  renderCallTraces,
  renderSkipped,
  renderSlabsByOrder,
  renderSlabsByProcess,
  renderTopTable,
} from './page-owner-analyzer.js';
import {
  renderModuleOrderReport,
  renderModuleReport,
  renderOrderReport,
  sortByModule,
  sortByModuleAndOrder,
} from './reporter.js';

export const REPORT_VIEWS: readonly ReportView[] = ['modules', 'module-order', 'orders', 'analysis', 'slabs'];

export function isReportView(value: string): value is ReportView {
  return REPORT_VIEWS.some((view) => view === value);
}

/**
 * Run every report over one page_owner dump.
 */
export function buildReportSet(content: string): PageOwnerReportSet {
  const lines = splitLines(content);

  const parseStats = createParseStats();
  const byModule = new AllocationAggregator('module');
  const byModuleOrder = new AllocationAggregator('module-order');
  for (const event of parseAllocationEvents(lines, parseStats)) {
    byModule.add(event);
    byModuleOrder.add(event);
  }

  const orders = new OrderTotalsAggregator();
  orders.addAll(parseOrderSamples(lines, () => orders.skip()));

  return {
    modules: sortByModule(byModule.records()),
    moduleOrders: sortByModuleAndOrder(byModuleOrder.records()),
    orders: orders.totals(),
    analysis: analyzePageOwner(lines),
    parseStats,
    totalLines: lines.length,
  };
}

export function renderReportView(set: PageOwnerReportSet, view: ReportView, options: RenderOptions): string[] {
  switch (view) {
    case 'modules':
      return renderModuleReport(set.modules);
    case 'module-order':
      return renderModuleOrderReport(set.moduleOrders);
    case 'orders':
      return renderOrderReport(set.orders);
    case 'analysis':
      return [
        ...renderTopTable('Processes', set.analysis.processes, options.unit, options.topN),
        ...renderTopTable('Modules', set.analysis.modules, options.unit, options.topN),
        ...renderCallTraces(set.analysis.callTraces, options.unit, options.callTraceTopN),
        ...renderSkipped(set.analysis.skipped),
      ];
    case 'slabs':
      return [
        ...renderTopTable('Slab Functions', set.analysis.slabs, options.unit, options.topN),
        ...renderSlabsByOrder(set.analysis.slabByOrder, options.unit),
        ...renderSlabsByProcess(set.analysis.slabByProcess, options.unit, options.topN),
      ];
  }
}

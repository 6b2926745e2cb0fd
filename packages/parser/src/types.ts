// ============================================================
// Allocation events (block parser)
// ============================================================

export interface AllocationEvent {
  order: number;
  pageCount: number;   // 2^order
  module: string;
}

export interface ParseStats {
  blocks: number;
  events: number;
  skipped: {
    missingOrder: number;   // header without a usable "order N"
    missingModule: number;  // block closed before a [module] token was seen
  };
}

// ============================================================
// Aggregation
// ============================================================

export type GroupingMode = 'module' | 'module-order';

export interface AggregateRecord {
  module: string;
  order?: number;      // set only in 'module-order' mode
  count: number;
  pages: number;
}

export interface OrderSample {
  order: number;
  pageCount: number;
}

export interface OrderTotal {
  order: number;
  pages: number;
}

export interface OrderTotals {
  orders: OrderTotal[];   // ascending by order
  totalPages: number;
  skippedLines: number;
}

// ============================================================
// Full block analysis
// ============================================================

export interface AllocationBlock {
  order: number;
  mask?: string;
  pid?: number;
  tgid?: number;
  process: string;
  timestampNs?: number;
  trace: string[];
  lineNumber: number;
}

export interface UsageStat {
  name: string;
  allocs: number;
  pages: number;
}

export interface CallTraceStat {
  trace: string[];
  count: number;
  pages: number;
  byProcess: UsageStat[];
}

export interface ProcessModuleStat {
  process: string;
  module: string;
  allocs: number;
  pages: number;
}

export interface SlabSplit {
  slabPages: number;
  nonSlabPages: number;
}

export interface OrderSlabSplit extends SlabSplit {
  order: number;
}

export interface ProcessSlabSplit extends SlabSplit {
  process: string;
}

export interface AnalysisSkips {
  missingOrder: number;
  invalidOrder: number;
}

export interface PageOwnerAnalysis {
  totalAllocations: number;
  totalPages: number;
  processes: UsageStat[];       // pages desc
  modules: UsageStat[];         // pages desc
  callTraces: CallTraceStat[];  // count desc
  processModules: ProcessModuleStat[];
  slabs: UsageStat[];                // slab-path functions, pages desc
  slabByOrder: OrderSlabSplit[];     // order asc
  slabByProcess: ProcessSlabSplit[]; // slab + non-slab desc
  skipped: AnalysisSkips;
}

export type MemoryUnit = 'K' | 'M' | 'G';

export interface RenderOptions {
  unit: MemoryUnit;
  topN: number;
  callTraceTopN: number;
}

// ============================================================
// Report set
// ============================================================

export interface PageOwnerReportSet {
  modules: AggregateRecord[];       // sorted for the by-module report
  moduleOrders: AggregateRecord[];  // sorted for the by-module-and-order report
  orders: OrderTotals;
  analysis: PageOwnerAnalysis;
  parseStats: ParseStats;
  totalLines: number;
}

export type ReportView = 'modules' | 'module-order' | 'orders' | 'analysis' | 'slabs';

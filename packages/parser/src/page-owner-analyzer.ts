import type {
  AllocationBlock,
  CallTraceStat,
  MemoryUnit,
  OrderSlabSplit,
  PageOwnerAnalysis,
  ProcessModuleStat,
  ProcessSlabSplit,
  SlabSplit,
  UsageStat,
} from './types.js';
import { type BlockParseSkips, extractModule, pagesForOrder, parseAllocationBlocks } from './page-owner-parser.js';
import { addPages } from './aggregator.js';
import { PAGE_SIZE_KB } from './reporter.js';

// ============================================================
// Analysis
// ============================================================

class UsageTable {
  private readonly rows = new Map<string, UsageStat>();

  add(name: string, pages: number): void {
    let row = this.rows.get(name);
    if (!row) {
      row = { name, allocs: 0, pages: 0 };
      this.rows.set(name, row);
    }
    row.allocs += 1;
    row.pages = addPages(row.pages, pages);
  }

  sorted(): UsageStat[] {
    return Array.from(this.rows.values()).sort((a, b) => b.pages - a.pages);
  }
}

interface TraceAccumulator {
  trace: string[];
  count: number;
  pages: number;
  byProcess: UsageTable;
}

/**
 * Modules named anywhere in a block's trace, each once, in first-seen order.
 */
export function modulesInTrace(trace: string[]): string[] {
  const modules = new Set<string>();
  for (const line of trace) {
    const module = extractModule(line);
    if (module) modules.add(module);
  }
  return [...modules];
}

// Any of these on a trace puts the whole block on the slab side.
const SLAB_ALLOCATORS = ['kmem_cache_alloc', 'slab_alloc', 'allocate_slab', '__kmalloc'];
const SLAB_PATH_RE = /kmalloc|slab|cache|kfree/i;

/**
 * Slab-path functions on a block's trace (name before the `+offset`), each
 * once, in first-seen order.
 */
export function slabFunctionsInTrace(trace: string[]): string[] {
  const functions = new Set<string>();
  for (const line of trace) {
    if (SLAB_PATH_RE.test(line)) {
      functions.add(line.trim().split('+')[0]);
    }
  }
  return [...functions];
}

export function isSlabAllocation(trace: string[]): boolean {
  return trace.some((line) => SLAB_ALLOCATORS.some((fn) => line.includes(fn)));
}

function addSplit<K>(table: Map<K, SlabSplit>, key: K, pages: number, slab: boolean): void {
  const split = table.get(key) ?? { slabPages: 0, nonSlabPages: 0 };
  if (slab) {
    split.slabPages += pages;
  } else {
    split.nonSlabPages += pages;
  }
  table.set(key, split);
}

function splitTotal(split: SlabSplit): number {
  return split.slabPages + split.nonSlabPages;
}

/**
 * Fold every allocation block into per-process, per-module, per-call-trace
 * process x module and slab usage.
 */
export function analyzePageOwner(lines: Iterable<string>): PageOwnerAnalysis {
  const skips: BlockParseSkips = { missingOrder: 0, invalidOrder: 0 };
  const processes = new UsageTable();
  const modules = new UsageTable();
  const traces = new Map<string, TraceAccumulator>();
  const processModules = new Map<string, ProcessModuleStat>();
  const slabs = new UsageTable();
  const slabByOrder = new Map<number, SlabSplit>();
  const slabByProcess = new Map<string, SlabSplit>();
  let totalAllocations = 0;
  let totalPages = 0;

  for (const block of parseAllocationBlocks(lines, skips)) {
    const pages = pagesForOrder(block.order);
    totalAllocations++;
    totalPages = addPages(totalPages, pages);
    processes.add(block.process, pages);

    for (const module of modulesInTrace(block.trace)) {
      modules.add(module, pages);
      const key = `${block.process}\0${module}`;
      const pm = processModules.get(key) ?? { process: block.process, module, allocs: 0, pages: 0 };
      pm.allocs++;
      pm.pages += pages;
      processModules.set(key, pm);
    }

    for (const fn of slabFunctionsInTrace(block.trace)) {
      slabs.add(fn, pages);
    }
    const slab = isSlabAllocation(block.trace);
    addSplit(slabByOrder, block.order, pages, slab);
    addSplit(slabByProcess, block.process, pages, slab);

    recordTrace(traces, block, pages);
  }

  const callTraces: CallTraceStat[] = Array.from(traces.values())
    .map((t) => ({ trace: t.trace, count: t.count, pages: t.pages, byProcess: t.byProcess.sorted() }))
    .sort((a, b) => b.count - a.count);

  return {
    totalAllocations,
    totalPages,
    processes: processes.sorted(),
    modules: modules.sorted(),
    callTraces,
    processModules: Array.from(processModules.values()).sort((a, b) => b.pages - a.pages),
    slabs: slabs.sorted(),
    slabByOrder: Array.from(slabByOrder, ([order, split]): OrderSlabSplit => ({ order, ...split }))
      .sort((a, b) => a.order - b.order),
    slabByProcess: Array.from(slabByProcess, ([process, split]): ProcessSlabSplit => ({ process, ...split }))
      .sort((a, b) => splitTotal(b) - splitTotal(a)),
    skipped: { ...skips },
  };
}

function recordTrace(traces: Map<string, TraceAccumulator>, block: AllocationBlock, pages: number): void {
  const key = block.trace.join('\n');
  let acc = traces.get(key);
  if (!acc) {
    acc = { trace: block.trace, count: 0, pages: 0, byProcess: new UsageTable() };
    traces.set(key, acc);
  }
  acc.count++;
  acc.pages += pages;
  acc.byProcess.add(block.process, pages);
}

/**
 * Processes whose allocations went through `module`, pages desc.
 */
export function processesForModule(analysis: PageOwnerAnalysis, module: string): UsageStat[] {
  return analysis.processModules
    .filter((pm) => pm.module === module)
    .map((pm) => ({ name: pm.process, allocs: pm.allocs, pages: pm.pages }));
}

/**
 * Call traces restricted to the allocations made by `process`, count desc.
 */
export function callTracesForProcess(analysis: PageOwnerAnalysis, process: string): CallTraceStat[] {
  const result: CallTraceStat[] = [];
  for (const t of analysis.callTraces) {
    const own = t.byProcess.find((p) => p.name === process);
    if (own) {
      result.push({ trace: t.trace, count: own.allocs, pages: own.pages, byProcess: [own] });
    }
  }
  return result.sort((a, b) => b.count - a.count);
}

// ============================================================
// Rendering
// ============================================================

const UNIT_LABELS: Record<MemoryUnit, string> = { K: 'kB', M: 'MB', G: 'GB' };
const RULE = '='.repeat(50);
const THIN_RULE = '-'.repeat(50);

export function convertPages(pages: number, unit: MemoryUnit): { value: number; label: string } {
  const kb = pages * PAGE_SIZE_KB;
  const value = unit === 'G' ? kb / 1024 / 1024 : unit === 'M' ? kb / 1024 : kb;
  return { value, label: UNIT_LABELS[unit] };
}

function formatMemory(pages: number, unit: MemoryUnit): string {
  const { value, label } = convertPages(pages, unit);
  return `${value.toFixed(2).padStart(15)} ${label}`;
}

function usageRow(name: string, allocs: number, pages: number, unit: MemoryUnit): string {
  return `${name.padEnd(25)}${String(allocs).padStart(15)}${formatMemory(pages, unit)}`;
}

/**
 * "Top N <label>" table with a Total row summing the rows shown.
 */
export function renderTopTable(label: string, rows: UsageStat[], unit: MemoryUnit, topN: number): string[] {
  const top = rows.slice(0, topN);
  const out = [`Top ${topN} ${label}:`, RULE];
  let allocs = 0;
  let pages = 0;
  for (const row of top) {
    allocs += row.allocs;
    pages += row.pages;
    out.push(usageRow(row.name, row.allocs, row.pages, unit));
  }
  out.push(THIN_RULE, usageRow('Total', allocs, pages, unit), RULE);
  return out;
}

export function renderCallTraces(traces: CallTraceStat[], unit: MemoryUnit, topN: number): string[] {
  const out = [`Top ${topN} Call Traces:`, RULE];
  traces.slice(0, topN).forEach((t, i) => {
    const { value, label } = convertPages(t.pages, unit);
    out.push(`#${i + 1}: Seen ${t.count} times, ${value.toFixed(2)} ${label}`, ...t.trace, THIN_RULE);
  });
  return out;
}

function memoryCell(pages: number, unit: MemoryUnit): string {
  const { value, label } = convertPages(pages, unit);
  return `${value.toFixed(2)} ${label}`;
}

function splitRow(key: string, keyWidth: number, split: SlabSplit, unit: MemoryUnit): string {
  return (
    key.padEnd(keyWidth) +
    memoryCell(split.slabPages, unit).padEnd(20) +
    memoryCell(split.nonSlabPages, unit).padEnd(20) +
    memoryCell(splitTotal(split), unit)
  );
}

function sumSplits(rows: SlabSplit[]): SlabSplit {
  return rows.reduce(
    (sum, row) => ({ slabPages: sum.slabPages + row.slabPages, nonSlabPages: sum.nonSlabPages + row.nonSlabPages }),
    { slabPages: 0, nonSlabPages: 0 }
  );
}

function splitTable(
  keyLabel: string,
  keyWidth: number,
  rows: [string, SlabSplit][],
  total: SlabSplit,
  unit: MemoryUnit
): string[] {
  const label = UNIT_LABELS[unit];
  const rule = '-'.repeat(keyWidth + 60);
  const header =
    keyLabel.padEnd(keyWidth) +
    `Slabs (${label})`.padEnd(20) +
    `Non Slabs (${label})`.padEnd(20) +
    `Total (${label})`;
  return [
    header,
    rule,
    ...rows.map(([key, split]) => splitRow(key, keyWidth, split, unit)),
    rule,
    splitRow('Total', keyWidth, total, unit),
  ];
}

/**
 * Slab against non-slab pages for every order seen.
 */
export function renderSlabsByOrder(rows: OrderSlabSplit[], unit: MemoryUnit): string[] {
  const shown = rows.map((r): [string, SlabSplit] => [String(r.order), r]);
  return splitTable('Order', 10, shown, sumSplits(rows), unit);
}

/**
 * Slab against non-slab pages for the top N processes. The Total row
 * covers every process, not only those shown.
 */
export function renderSlabsByProcess(rows: ProcessSlabSplit[], unit: MemoryUnit, topN: number): string[] {
  const shown = rows.slice(0, topN).map((r): [string, SlabSplit] => [r.process, r]);
  return splitTable('Application', 20, shown, sumSplits(rows), unit);
}

export function renderSkipped(skipped: PageOwnerAnalysis['skipped']): string[] {
  return [
    `Total skipped: ${skipped.missingOrder + skipped.invalidOrder}`,
    ` - Missing order: ${skipped.missingOrder}`,
    ` - Invalid order: ${skipped.invalidOrder}`,
  ];
}

import type {
  AllocationBlock,
  AllocationEvent,
  OrderSample,
  ParseStats,
} from './types.js';

// page_owner block layout:
// Page allocated via order 2, mask 0x...(GFP_KERNEL), pid 1, tgid 1 (swapper/0), ts 1234 ns
// PFN 0x1000 type Unmovable Block 8 type Unmovable Flags 0x...(node=0|zone=1)
//  post_alloc_hook+0x.../0x...
//  vmxnet3_rq_alloc_rx_buf+0x.../0x... [vmxnet3]
// <blank>
const ALLOCATION_HEADER = 'Page allocated';
const ORDER_RE = /order (\d+)/;
const MODULE_RE = /\[([A-Za-z0-9_]+)\]/;
const HEADER_FIELDS_RE =
  /order (\d+), mask (0x[0-9a-fA-F]+(?:\([^)]*\))?)(?:, pid (\d+), tgid (\d+) \((.+?)\), ts (\d+) ns)?/;
const BLANK_RE = /^\s*$/;

// 2^52 is the largest page count still exactly representable.
export const MAX_ORDER = 52;

export function createParseStats(): ParseStats {
  return {
    blocks: 0,
    events: 0,
    skipped: { missingOrder: 0, missingModule: 0 },
  };
}

export function isBlankLine(line: string): boolean {
  return BLANK_RE.test(line);
}

export function isAllocationHeader(line: string): boolean {
  return line.includes(ALLOCATION_HEADER);
}

/**
 * First `[identifier]` token on the line, or undefined.
 */
export function extractModule(line: string): string | undefined {
  return line.match(MODULE_RE)?.[1];
}

/**
 * Order from an allocation header. Undefined when the line has no
 * "order N" or N is above MAX_ORDER.
 */
export function extractOrder(line: string): number | undefined {
  const m = line.match(ORDER_RE);
  if (!m) return undefined;
  return toOrder(m[1]);
}

function toOrder(text: string): number | undefined {
  if (!/^\d+$/.test(text)) return undefined;
  const order = parseInt(text, 10);
  return order <= MAX_ORDER ? order : undefined;
}

export function pagesForOrder(order: number): number {
  return 2 ** order;
}

/**
 * Split raw dump content into lines. Kept separate so callers that already
 * hold a line iterator can feed the parsers directly.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

type BlockState =
  | { kind: 'idle' }
  | { kind: 'in-block'; order: number | undefined; counted: boolean };

/**
 * Scan page_owner text for "Page allocated" blocks and yield one event per
 * block that names a module. Blocks without an order or without a module
 * are skipped and tallied in `stats`.
 */
export function* parseAllocationEvents(
  lines: Iterable<string>,
  stats: ParseStats = createParseStats()
): Generator<AllocationEvent> {
  let state: BlockState = { kind: 'idle' };

  const close = (): void => {
    if (state.kind === 'in-block' && state.order !== undefined && !state.counted) {
      stats.skipped.missingModule++;
    }
    state = { kind: 'idle' };
  };

  for (const line of lines) {
    if (isAllocationHeader(line)) {
      close();
      const order = extractOrder(line);
      stats.blocks++;
      if (order === undefined) stats.skipped.missingOrder++;
      state = { kind: 'in-block', order, counted: false };
      continue;
    }

    if (isBlankLine(line)) {
      close();
      continue;
    }

    if (state.kind !== 'in-block' || state.counted || state.order === undefined) {
      continue;
    }

    const module = extractModule(line);
    if (module) {
      state.counted = true;
      stats.events++;
      yield { order: state.order, pageCount: pagesForOrder(state.order), module };
    }
  }

  close();
}

/**
 * Looser order-only scan: any line starting with "Page" contributes 2^order,
 * order being its 5th whitespace-separated field ("order 3," -> "3").
 */
export function* parseOrderSamples(
  lines: Iterable<string>,
  onSkip: (line: string) => void = () => {}
): Generator<OrderSample> {
  for (const line of lines) {
    if (!line.startsWith('Page')) continue;

    const field = line.trim().split(/\s+/)[4];
    const order = field === undefined ? undefined : toOrder(field.replace(/,+$/, ''));
    if (order === undefined) {
      onSkip(line);
      continue;
    }
    yield { order, pageCount: pagesForOrder(order) };
  }
}

export interface BlockParseSkips {
  missingOrder: number;
  invalidOrder: number;
}

/**
 * Yield full allocation blocks: header fields plus the stack lines that
 * follow it. PFN lines are not part of the trace.
 */
export function* parseAllocationBlocks(
  lines: Iterable<string>,
  skips: BlockParseSkips = { missingOrder: 0, invalidOrder: 0 }
): Generator<AllocationBlock> {
  let current: AllocationBlock | null = null;
  let lineNumber = 0;

  for (const raw of lines) {
    lineNumber++;
    const line = raw.trim();

    if (line.startsWith(ALLOCATION_HEADER)) {
      if (current) yield current;
      current = parseHeader(line, lineNumber, skips);
      continue;
    }

    if (!line) {
      if (current) yield current;
      current = null;
      continue;
    }

    if (current && !line.startsWith('PFN')) {
      current.trace.push(line);
    }
  }

  if (current) yield current;
}

function parseHeader(
  line: string,
  lineNumber: number,
  skips: BlockParseSkips
): AllocationBlock | null {
  const m = line.match(HEADER_FIELDS_RE);
  const orderText = m?.[1] ?? line.match(ORDER_RE)?.[1];
  if (orderText === undefined) {
    skips.missingOrder++;
    return null;
  }

  const order = toOrder(orderText);
  if (order === undefined) {
    skips.invalidOrder++;
    return null;
  }

  const block: AllocationBlock = {
    order,
    process: 'Unknown',
    trace: [],
    lineNumber,
  };
  if (m) {
    block.mask = m[2];
    if (m[3] !== undefined) block.pid = parseInt(m[3], 10);
    if (m[4] !== undefined) block.tgid = parseInt(m[4], 10);
    if (m[5] !== undefined) block.process = m[5];
    if (m[6] !== undefined) block.timestampNs = parseInt(m[6], 10);
  }
  return block;
}

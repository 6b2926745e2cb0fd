import {
  AllocationAggregator,
  OrderTotalsAggregator,
  parseAllocationEvents,
  parseOrderSamples,
  renderModuleOrderReport,
  renderModuleReport,
  renderOrderReport,
  splitLines,
} from '@po-tools/parser';
import { ToolError, UsageError } from './errors.js';
import { readInputFile } from './input.js';

export type ReportVariant = 'module' | 'module-order' | 'order';

export interface ToolIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const consoleIO: ToolIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function renderVariant(tool: string, variant: ReportVariant, lines: string[], io: ToolIO): string[] {
  switch (variant) {
    case 'module':
      return renderModuleReport(new AllocationAggregator('module').addAll(parseAllocationEvents(lines)).records());
    case 'module-order':
      return renderModuleOrderReport(
        new AllocationAggregator('module-order').addAll(parseAllocationEvents(lines)).records()
      );
    case 'order': {
      const totals = new OrderTotalsAggregator();
      totals.addAll(
        parseOrderSamples(lines, (line) => {
          totals.skip();
          io.stderr(`[${tool}] Skipping line due to parse error: ${line.trim()}`);
        })
      );
      return renderOrderReport(totals.totals());
    }
  }
}

/**
 * Print a ToolError as-is; anything else gets the tool prefix.
 */
export function reportFailure(tool: string, err: unknown, io: ToolIO): number {
  if (err instanceof ToolError) {
    io.stderr(err.message);
    return err.exitCode;
  }
  const msg = err instanceof Error ? err.message : String(err);
  io.stderr(`[${tool}] ${msg}`);
  return 1;
}

/**
 * `<tool> <input_file>`: one of the three fixed-layout page_owner reports.
 * Returns the process exit code.
 */
export function runReportTool(tool: string, variant: ReportVariant, args: string[], io: ToolIO = consoleIO): number {
  try {
    if (args.length !== 1) {
      throw new UsageError(`Usage: ${tool} input_file`);
    }
    const lines = splitLines(readInputFile(args[0]));
    for (const line of renderVariant(tool, variant, lines, io)) {
      io.stdout(line);
    }
    return 0;
  } catch (err) {
    return reportFailure(tool, err, io);
  }
}

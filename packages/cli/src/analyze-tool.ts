import yargs from 'yargs';
import {
  type MemoryUnit,
  type PageOwnerAnalysis,
  type RenderOptions,
  analyzePageOwner,
  callTracesForProcess,
  processesForModule,
  renderCallTraces,
  renderSkipped,
  renderSlabsByOrder,
  renderSlabsByProcess,
  renderTopTable,
  splitLines,
  toKilobytes,
} from '@po-tools/parser';
import { getConfig } from './config.js';
import { UsageError } from './errors.js';
import { readInputFile } from './input.js';
import { type ToolIO, consoleIO, reportFailure } from './report-tool.js';

const TOOL = 'po-analyze';

export interface AnalyzeOptions {
  file: string;
  processes: boolean;
  modules: boolean;
  calltraces: boolean;
  slabs: boolean;
  calltraceProcess?: string;
  filterModule?: string;
  unit: MemoryUnit;
  topN: number;
  callTraceTopN: number;
  json: boolean;
  verbose: boolean;
}

function positiveInteger(name: string) {
  return (value: number): number => {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${name} must be a positive integer`);
    }
    return value;
  };
}

/**
 * Parse po-analyze arguments. Returns null when --help was printed.
 */
export function parseAnalyzeArgs(args: string[], defaults: RenderOptions): AnalyzeOptions | null {
  const argv = yargs(args)
    .scriptName(TOOL)
    .usage('Usage: $0 <file> [options]')
    .option('processes', { alias: 'p', type: 'boolean', default: false, description: 'Show top memory-using processes' })
    .option('modules', { alias: 'm', type: 'boolean', default: false, description: 'Show top memory-using modules' })
    .option('calltraces', { alias: 'c', type: 'boolean', default: false, description: 'Show top call trace patterns' })
    .option('slabs', { alias: 's', type: 'boolean', default: false, description: 'Show slab allocator usage' })
    .option('calltrace-process', { type: 'string', description: 'Show call traces only for this process' })
    .option('filter-module', { type: 'string', description: 'Show top processes using this module' })
    .option('K', { type: 'boolean', description: 'Show memory in kB' })
    .option('M', { type: 'boolean', description: 'Show memory in MB' })
    .option('G', { type: 'boolean', description: 'Show memory in GB' })
    .option('top', {
      alias: 'n',
      type: 'number',
      default: defaults.topN,
      description: 'Rows per table',
      coerce: positiveInteger('--top'),
    })
    .option('trace-top', {
      alias: 't',
      type: 'number',
      default: defaults.callTraceTopN,
      description: 'Call traces to show',
      coerce: positiveInteger('--trace-top'),
    })
    .option('json', { type: 'boolean', default: false, description: 'Print the analysis as JSON' })
    .option('verbose', { alias: 'v', type: 'boolean', default: false, description: 'Verbose output' })
    .demandCommand(1, 1, 'Exactly one page_owner file is required', 'Exactly one page_owner file is required')
    .check((a) => {
      if ([a.K, a.M, a.G].filter(Boolean).length > 1) {
        throw new Error('Choose only one of -K, -M or -G');
      }
      if (a['calltrace-process'] !== undefined && !a.calltraces) {
        throw new Error("Error: '--calltrace-process' requires '-c' or '--calltraces' to be specified.");
      }
      if (a['filter-module'] !== undefined && !a.processes) {
        throw new Error("Error: '--filter-module' requires '-p' or '--processes' to be specified.");
      }
      if (!a.json && !a.processes && !a.modules && !a.calltraces && !a.slabs) {
        throw new Error('Select at least one of --processes, --modules, --calltraces or --slabs');
      }
      return true;
    })
    .example('$0 page_owner.txt -m -p', 'Top modules and processes in GB')
    .example('$0 page_owner.txt -c --calltrace-process kworker/0:1 -M', 'Call traces of one process in MB')
    .example('$0 page_owner.txt -s', 'Slab functions and slab/non-slab split')
    .parserConfiguration({ 'parse-positional-numbers': false })
    .strictOptions()
    .help()
    .alias('help', 'h')
    .version(false)
    .exitProcess(false)
    .fail((msg, err) => {
      throw new UsageError(msg || err?.message || 'Invalid arguments');
    })
    .parseSync();

  if (argv.help) return null;

  return {
    file: String(argv._[0]),
    processes: argv.processes,
    modules: argv.modules,
    calltraces: argv.calltraces,
    slabs: argv.slabs,
    calltraceProcess: argv['calltrace-process'],
    filterModule: argv['filter-module'],
    unit: argv.K ? 'K' : argv.M ? 'M' : argv.G ? 'G' : defaults.unit,
    topN: argv.top,
    callTraceTopN: argv['trace-top'],
    json: argv.json,
    verbose: argv.verbose,
  };
}

export function renderAnalysis(analysis: PageOwnerAnalysis, o: AnalyzeOptions): string[] {
  const out: string[] = [];

  if (o.processes) {
    if (o.filterModule !== undefined) {
      const rows = processesForModule(analysis, o.filterModule);
      if (rows.length === 0) {
        out.push(`No allocations found for module '${o.filterModule}'.`);
      } else {
        out.push(...renderTopTable(`Processes using module '${o.filterModule}'`, rows, o.unit, o.topN));
      }
    } else if (analysis.totalAllocations === 0) {
      out.push('Process-level allocation data not found in this dump format.');
    } else {
      out.push(...renderTopTable('Processes', analysis.processes, o.unit, o.topN));
    }
  }

  if (o.modules) {
    out.push(...renderTopTable('Modules', analysis.modules, o.unit, o.topN));
  }

  if (o.calltraces) {
    const traces = o.calltraceProcess !== undefined
      ? callTracesForProcess(analysis, o.calltraceProcess)
      : analysis.callTraces;
    if (o.calltraceProcess !== undefined && traces.length === 0) {
      out.push(`No call traces found for process '${o.calltraceProcess}'`);
    } else {
      out.push(...renderCallTraces(traces, o.unit, o.callTraceTopN));
    }
  }

  if (o.slabs) {
    out.push(
      ...renderTopTable('Slab Functions', analysis.slabs, o.unit, o.topN),
      ...renderSlabsByOrder(analysis.slabByOrder, o.unit),
      ...renderSlabsByProcess(analysis.slabByProcess, o.unit, o.topN)
    );
  }

  if (o.verbose) {
    out.push(...renderSkipped(analysis.skipped));
  }

  return out;
}

export function analysisToJson(analysis: PageOwnerAnalysis, o: AnalyzeOptions): Record<string, unknown> {
  const all = !o.processes && !o.modules && !o.calltraces && !o.slabs;
  const result: Record<string, unknown> = {
    file: o.file,
    totalAllocations: analysis.totalAllocations,
    totalPages: analysis.totalPages,
    totalKilobytes: toKilobytes(analysis.totalPages),
  };

  if (all || o.processes) {
    const rows = o.filterModule !== undefined ? processesForModule(analysis, o.filterModule) : analysis.processes;
    result.processes = rows.slice(0, o.topN);
  }
  if (all || o.modules) {
    result.modules = analysis.modules.slice(0, o.topN);
  }
  if (all || o.calltraces) {
    const traces = o.calltraceProcess !== undefined
      ? callTracesForProcess(analysis, o.calltraceProcess)
      : analysis.callTraces;
    result.callTraces = traces.slice(0, o.callTraceTopN);
  }
  if (all || o.slabs) {
    result.slabs = analysis.slabs.slice(0, o.topN);
    result.slabByOrder = analysis.slabByOrder;
    result.slabByProcess = analysis.slabByProcess.slice(0, o.topN);
  }
  result.skipped = analysis.skipped;
  return result;
}

export function runAnalyzeTool(args: string[], io: ToolIO = consoleIO, defaults: RenderOptions = getConfig().render): number {
  try {
    const options = parseAnalyzeArgs(args, defaults);
    if (!options) return 0;

    if (options.verbose) {
      io.stderr(`[${TOOL}] Analyzing ${options.file} with unit ${options.unit}`);
    }

    const analysis = analyzePageOwner(splitLines(readInputFile(options.file)));
    const out = options.json
      ? [JSON.stringify(analysisToJson(analysis, options), null, 2)]
      : renderAnalysis(analysis, options);
    for (const line of out) io.stdout(line);
    return 0;
  } catch (err) {
    return reportFailure(TOOL, err, io);
  }
}

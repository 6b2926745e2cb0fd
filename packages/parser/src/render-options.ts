import type { MemoryUnit, RenderOptions } from './types.js';

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  unit: 'G',
  topN: 10,
  callTraceTopN: 5,
};

export function parseMemoryUnit(value: string | undefined): MemoryUnit | undefined {
  const unit = value?.trim().toUpperCase();
  return unit === 'K' || unit === 'M' || unit === 'G' ? unit : undefined;
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) return fallback;
  const n = parseInt(value, 10);
  return n > 0 ? n : fallback;
}

/**
 * Render defaults from the environment:
 *   PO_UNIT (K|M|G), PO_TOP, PO_CALLTRACE_TOP
 */
export function renderOptionsFromEnv(source: NodeJS.ProcessEnv = process.env): RenderOptions {
  return {
    unit: parseMemoryUnit(source.PO_UNIT) ?? DEFAULT_RENDER_OPTIONS.unit,
    topN: positiveInt(source.PO_TOP, DEFAULT_RENDER_OPTIONS.topN),
    callTraceTopN: positiveInt(source.PO_CALLTRACE_TOP, DEFAULT_RENDER_OPTIONS.callTraceTopN),
  };
}

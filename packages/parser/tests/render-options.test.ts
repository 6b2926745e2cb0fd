import { describe, it, expect } from 'vitest';
import { DEFAULT_RENDER_OPTIONS, parseMemoryUnit, renderOptionsFromEnv } from '../src/render-options.js';

describe('renderOptionsFromEnv', () => {
  it('should use defaults when nothing is set', () => {
    expect(renderOptionsFromEnv({})).toEqual(DEFAULT_RENDER_OPTIONS);
  });

  it('should read unit and limits', () => {
    expect(renderOptionsFromEnv({ PO_UNIT: 'm', PO_TOP: '3', PO_CALLTRACE_TOP: '7' })).toEqual({
      unit: 'M',
      topN: 3,
      callTraceTopN: 7,
    });
  });

  it('should ignore values it cannot use', () => {
    expect(renderOptionsFromEnv({ PO_UNIT: 'T', PO_TOP: '0', PO_CALLTRACE_TOP: 'many' })).toEqual(
      DEFAULT_RENDER_OPTIONS
    );
  });
});

describe('parseMemoryUnit', () => {
  it('should accept K, M and G in any case', () => {
    expect(parseMemoryUnit('k')).toBe('K');
    expect(parseMemoryUnit(' G ')).toBe('G');
    expect(parseMemoryUnit('kb')).toBeUndefined();
    expect(parseMemoryUnit(undefined)).toBeUndefined();
  });
});

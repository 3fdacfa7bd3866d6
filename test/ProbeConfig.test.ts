import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig, parseTimeoutSeconds, parseCompareMode, DEFAULT_CONFIG } from '../src/ProbeConfig';

describe('loadConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(loadConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads environment variables', () => {
    const config = loadConfig({}, {
      PROBE_LOG_MACRO: 'LOG_PRINT',
      PROBE_LOG_TAG: 'APP_TAG',
      PROBE_TIMEOUT: '2.5',
      PROBE_HARNESS_DIR: 'ci/harness',
      PROBE_COMPARE_MODE: 'sequence'
    });
    expect(config.logMacro).toBe('LOG_PRINT');
    expect(config.logTag).toBe('APP_TAG');
    expect(config.timeoutMs).toBe(2500);
    expect(config.harnessDir).toBe(path.resolve('ci/harness'));
    expect(config.compareMode).toBe('sequence');
  });

  it('lets explicit options win over the environment', () => {
    const config = loadConfig({ logTag: 'CLI_TAG', logMacro: undefined }, { PROBE_LOG_TAG: 'ENV_TAG', PROBE_LOG_MACRO: 'ENV_LOG' });
    expect(config.logTag).toBe('CLI_TAG');
    expect(config.logMacro).toBe('ENV_LOG');
  });
});

describe('option parsers', () => {
  it('rejects invalid timeouts', () => {
    expect(parseTimeoutSeconds('20')).toBe(20000);
    expect(() => parseTimeoutSeconds('0')).toThrow('Invalid timeout: 0');
    expect(() => parseTimeoutSeconds('soon')).toThrow('Invalid timeout: soon');
  });

  it('accepts only known compare modes', () => {
    expect(parseCompareMode('substring')).toBe('substring');
    expect(() => parseCompareMode('fuzzy')).toThrow('Invalid compare mode: fuzzy');
  });
});

import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('fills defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      logLevel: 'info',
      maxUploadBytes: 25 * 1024 * 1024,
      audit: { balanceTolerance: 1, maxRangeCells: 50_000, balanceSheet: undefined },
      narrative: {
        provider: 'none',
        geminiApiKey: undefined,
        geminiModel: 'gemini-2.5-pro',
        ollamaBaseUrl: 'http://localhost:11434',
        ollamaModel: 'qwen3:32b'
      }
    });
  });

  it('reads overrides and treats empty strings as unset', () => {
    const config = loadConfig({
      PORT: '8080',
      MAX_UPLOAD_MB: '0.5',
      AUDIT_BALANCE_TOLERANCE: '0.01',
      AUDIT_BALANCE_SHEET: 'BS',
      NARRATIVE_PROVIDER: 'gemini',
      GEMINI_API_KEY: ''
    });
    expect(config.port).toBe(8080);
    expect(config.maxUploadBytes).toBe(524288);
    expect(config.audit).toEqual({ balanceTolerance: 0.01, maxRangeCells: 50_000, balanceSheet: 'BS' });
    expect(config.narrative.provider).toBe('gemini');
    expect(config.narrative.geminiApiKey).toBeUndefined();
  });

  it('lists every invalid setting', () => {
    const load = () => loadConfig({ PORT: 'abc', NARRATIVE_PROVIDER: 'openai' });
    expect(load).toThrow(ConfigError);
    try {
      load();
    } catch (e) {
      expect(e instanceof ConfigError && e.issues.map(i => i.split(':')[0])).toEqual(['PORT', 'NARRATIVE_PROVIDER']);
    }
  });
});

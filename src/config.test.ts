import {
  TrialConfig,
  DEFAULT_SESSION_CONFIG,
  DEFAULT_TRIAL_CONFIG,
  resolveSessionConfig,
  resolveTrialConfig,
} from './config';
import { ConfigurationError } from './errors';

describe('resolveTrialConfig', () => {
  test('returns the defaults for an empty config', () => {
    expect(resolveTrialConfig()).toEqual(DEFAULT_TRIAL_CONFIG);
  });

  test('merges overrides over the defaults', () => {
    const config = resolveTrialConfig({ glyph: 'F', captureWindowMs: 800 });
    expect(config.glyph).toBe('F');
    expect(config.captureWindowMs).toBe(800);
    expect(config.frameDurationMs).toBe(500);
  });

  test('explicit undefined fields take their defaults', () => {
    const config = resolveTrialConfig({ glyph: undefined, captureWindowMs: undefined, orientations: undefined });
    expect(config).toEqual(DEFAULT_TRIAL_CONFIG);
  });

  const invalid: [TrialConfig, string][] = [
    [{ shrinkRate: 1 }, 'shrinkRate must lie in (0, 1), got 1'],
    [{ glyphScale: 1.5 }, 'glyphScale must be an integer, got 1.5'],
    [{ captureWindowMs: 0 }, 'captureWindowMs must be a positive number, got 0'],
    [{ glyph: 'EE' }, "glyph must be a single character, got 'EE'"],
    [{ orientations: [] }, 'orientations must name at least one orientation'],
  ];

  test.each(invalid)('rejects %p', (config, message) => {
    expect(() => resolveTrialConfig(config)).toThrow(message);
  });

  test('rejects glyphs missing from the font as a configuration error', () => {
    expect(() => resolveTrialConfig({ glyph: '!' })).toThrow(ConfigurationError);
  });
});

describe('resolveSessionConfig', () => {
  test('drops the monitor and keeps session defaults', () => {
    const config = resolveSessionConfig({
      maxTrials: 3,
      monitor: { widthMm: 600, heightMm: 340, widthPx: 1920, heightPx: 1080 },
    });
    expect(config).toEqual({ ...DEFAULT_SESSION_CONFIG, maxTrials: 3 });
  });

  test('explicit undefined session fields take their defaults', () => {
    const config = resolveSessionConfig({ maxTrials: undefined, verbose: undefined, glyph: undefined });
    expect(config).toEqual(DEFAULT_SESSION_CONFIG);
  });

  test('rejects a negative trial limit', () => {
    expect(() => resolveSessionConfig({ maxTrials: -1 })).toThrow(
      'maxTrials must be a non-negative integer, got -1'
    );
  });
});

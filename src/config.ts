/**
 * Trial and session configuration.
 * Partial configs are merged over the defaults and validated once.
 */

import { ConfigurationError } from './errors';
import { MonitorGeometry, Orientation } from './types';
import { ORIENTATIONS } from './orientation';
import { DEFAULT_GLYPH_SCALE, DEFAULT_SHRINK_RATE } from './TargetRenderer';
import { getGlyphBitmap } from './utils/raster';

export interface TrialConfig {
  /** Character drawn inside the target (default: 'E') */
  glyph?: string;

  /** Pixels per font cell (default: 2) */
  glyphScale?: number;

  /** Multiplier applied to the disc radius each frame (default: 0.9) */
  shrinkRate?: number;

  /** How long each animation frame stays on screen, in ms (default: 500) */
  frameDurationMs?: number;

  /** Input polling tick while animating, in ms (default: 50) */
  pollIntervalMs?: number;

  /** Window after the colour cue in which a matching key captures, in ms (default: 500) */
  captureWindowMs?: number;

  /** Input polling tick inside the capture window, in ms (default: 42) */
  captureTickMs?: number;

  /** Blank screen shown after each trial, in ms (default: 500) */
  settleDelayMs?: number;

  /** KeyboardEvent.key that ends the session (default: 'q') */
  quitKey?: string;

  /** Orientations a trial may draw from (default: all four) */
  orientations?: readonly Orientation[];
}

export interface SessionConfig extends TrialConfig {
  /** Pause between trials, polled for the quit key, in ms (default: 500) */
  interTrialDelayMs?: number;

  /** Stop after this many trials; 0 runs until quit (default: 0) */
  maxTrials?: number;

  /** Log every trial outcome (default: false) */
  verbose?: boolean;

  /** Monitor dimensions that take precedence over detection */
  monitor?: MonitorGeometry;
}

export const DEFAULT_TRIAL_CONFIG: Required<TrialConfig> = {
  glyph: 'E',
  glyphScale: DEFAULT_GLYPH_SCALE,
  shrinkRate: DEFAULT_SHRINK_RATE,
  frameDurationMs: 500,
  pollIntervalMs: 50,
  captureWindowMs: 500,
  captureTickMs: 42,
  settleDelayMs: 500,
  quitKey: 'q',
  orientations: ORIENTATIONS,
};

export const DEFAULT_SESSION_CONFIG: Required<Omit<SessionConfig, 'monitor'>> = {
  ...DEFAULT_TRIAL_CONFIG,
  interTrialDelayMs: 500,
  maxTrials: 0,
  verbose: false,
};

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got ${value}`);
  }
}

/**
 * Fields left undefined, including explicit undefined, take their defaults.
 */
export function resolveTrialConfig(config: TrialConfig = {}): Required<TrialConfig> {
  const defaults = DEFAULT_TRIAL_CONFIG;
  const resolved: Required<TrialConfig> = {
    glyph: config.glyph ?? defaults.glyph,
    glyphScale: config.glyphScale ?? defaults.glyphScale,
    shrinkRate: config.shrinkRate ?? defaults.shrinkRate,
    frameDurationMs: config.frameDurationMs ?? defaults.frameDurationMs,
    pollIntervalMs: config.pollIntervalMs ?? defaults.pollIntervalMs,
    captureWindowMs: config.captureWindowMs ?? defaults.captureWindowMs,
    captureTickMs: config.captureTickMs ?? defaults.captureTickMs,
    settleDelayMs: config.settleDelayMs ?? defaults.settleDelayMs,
    quitKey: config.quitKey ?? defaults.quitKey,
    orientations: config.orientations ?? defaults.orientations,
  };

  requirePositive('glyphScale', resolved.glyphScale);
  requirePositive('frameDurationMs', resolved.frameDurationMs);
  requirePositive('pollIntervalMs', resolved.pollIntervalMs);
  requirePositive('captureWindowMs', resolved.captureWindowMs);
  requirePositive('captureTickMs', resolved.captureTickMs);

  if (!Number.isInteger(resolved.glyphScale)) {
    throw new ConfigurationError(`glyphScale must be an integer, got ${resolved.glyphScale}`);
  }
  if (!(resolved.shrinkRate > 0 && resolved.shrinkRate < 1)) {
    throw new ConfigurationError(`shrinkRate must lie in (0, 1), got ${resolved.shrinkRate}`);
  }
  if (resolved.settleDelayMs < 0) {
    throw new ConfigurationError(`settleDelayMs must not be negative, got ${resolved.settleDelayMs}`);
  }
  if (resolved.glyph.length !== 1) {
    throw new ConfigurationError(`glyph must be a single character, got '${resolved.glyph}'`);
  }
  if (resolved.orientations.length === 0) {
    throw new ConfigurationError('orientations must name at least one orientation');
  }
  try {
    getGlyphBitmap(resolved.glyph);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  return resolved;
}

export function resolveSessionConfig(config: SessionConfig = {}): Required<Omit<SessionConfig, 'monitor'>> {
  const resolved: Required<Omit<SessionConfig, 'monitor'>> = {
    ...resolveTrialConfig(config),
    interTrialDelayMs: config.interTrialDelayMs ?? DEFAULT_SESSION_CONFIG.interTrialDelayMs,
    maxTrials: config.maxTrials ?? DEFAULT_SESSION_CONFIG.maxTrials,
    verbose: config.verbose ?? DEFAULT_SESSION_CONFIG.verbose,
  };

  if (resolved.interTrialDelayMs < 0) {
    throw new ConfigurationError(`interTrialDelayMs must not be negative, got ${resolved.interTrialDelayMs}`);
  }
  if (!Number.isInteger(resolved.maxTrials) || resolved.maxTrials < 0) {
    throw new ConfigurationError(`maxTrials must be a non-negative integer, got ${resolved.maxTrials}`);
  }

  return resolved;
}

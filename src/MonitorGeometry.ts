/**
 * Monitor geometry: validation, string parsing, presets and detection.
 *
 * Browsers expose the screen's pixel size but never its physical size, so
 * detection only succeeds once a physical size has been saved for this
 * browser (see saveMonitorSize) and otherwise reports absence.
 */

import { ConfigurationError } from './errors';
import { MonitorGeometry } from './types';
import { MonitorGeometryDetector } from './collaborators';

const MONITOR_SIZE_STORAGE_KEY = 'gazecollect-monitor-mm';

export interface ScreenPreset {
  id: string;
  label: string;
  diagonalInches: number;
  widthMm: number;
  heightMm: number;
}

/**
 * Common 16:9 monitor sizes
 */
export const SCREEN_PRESETS: Record<string, ScreenPreset> = {
  laptop13: { id: 'laptop13', label: '13.3" Laptop', diagonalInches: 13.3, widthMm: 294, heightMm: 165 },
  laptop15: { id: 'laptop15', label: '15.6" Laptop', diagonalInches: 15.6, widthMm: 345, heightMm: 194 },
  desktop24: { id: 'desktop24', label: '24" Monitor', diagonalInches: 24, widthMm: 531, heightMm: 299 },
  desktop27: { id: 'desktop27', label: '27" Monitor', diagonalInches: 27, widthMm: 597, heightMm: 336 },
};

export function validateMonitorGeometry(geometry: MonitorGeometry): MonitorGeometry {
  const entries: [keyof MonitorGeometry, number][] = [
    ['widthMm', geometry.widthMm],
    ['heightMm', geometry.heightMm],
    ['widthPx', geometry.widthPx],
    ['heightPx', geometry.heightPx],
  ];
  for (const [name, value] of entries) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`Monitor ${name} must be a positive number, got ${value}`);
    }
  }
  if (!Number.isInteger(geometry.widthPx) || !Number.isInteger(geometry.heightPx)) {
    throw new ConfigurationError(
      `Monitor pixel dimensions must be integers, got ${geometry.widthPx}x${geometry.heightPx}`
    );
  }
  return geometry;
}

/**
 * Parses "width,height", e.g. "600,340".
 */
export function parseDimensionPair(value: string, label: string = 'dimensions'): [number, number] {
  const parts = value.split(',').map(part => part.trim());
  if (parts.length !== 2 || parts.some(part => !/^\d+$/.test(part))) {
    throw new ConfigurationError(`Expected ${label} as "width,height", got "${value}"`);
  }
  return [Number(parts[0]), Number(parts[1])];
}

export function parseMonitorGeometry(mm: string, pixels: string): MonitorGeometry {
  const [widthMm, heightMm] = parseDimensionPair(mm, 'monitor_mm');
  const [widthPx, heightPx] = parseDimensionPair(pixels, 'monitor_pixels');
  return validateMonitorGeometry({ widthMm, heightMm, widthPx, heightPx });
}

export function monitorGeometryFromPreset(presetId: string, widthPx: number, heightPx: number): MonitorGeometry {
  const preset = SCREEN_PRESETS[presetId];
  if (!preset) {
    throw new ConfigurationError(
      `Unknown screen preset '${presetId}'. Known presets: ${Object.keys(SCREEN_PRESETS).join(', ')}`
    );
  }
  return validateMonitorGeometry({ widthMm: preset.widthMm, heightMm: preset.heightMm, widthPx, heightPx });
}

/**
 * Uses the override when given, otherwise the detector. Missing geometry is
 * a configuration error: a session never starts on made-up dimensions.
 */
export function resolveMonitorGeometry(
  override?: MonitorGeometry,
  detect?: MonitorGeometryDetector
): MonitorGeometry {
  if (override) {
    return validateMonitorGeometry(override);
  }

  const detected = detect?.() ?? null;
  if (!detected) {
    throw new ConfigurationError(
      'Please supply monitor dimensions manually as they could not be retrieved.'
    );
  }
  return validateMonitorGeometry(detected);
}

export function loadMonitorSize(): [number, number] | null {
  try {
    const raw = localStorage.getItem(MONITOR_SIZE_STORAGE_KEY);
    return raw === null ? null : parseDimensionPair(raw, 'saved monitor size');
  } catch (error) {
    console.warn('[MonitorGeometry] Ignoring saved monitor size:', error);
    return null;
  }
}

export function saveMonitorSize([widthMm, heightMm]: [number, number]): void {
  try {
    localStorage.setItem(MONITOR_SIZE_STORAGE_KEY, `${widthMm},${heightMm}`);
  } catch (error) {
    console.warn('[MonitorGeometry] Failed to save monitor size:', error);
  }
}

/**
 * Screen pixels from window.screen, millimetres from the saved monitor size.
 */
export const detectMonitorGeometry: MonitorGeometryDetector = () => {
  if (typeof window === 'undefined') {
    return null;
  }

  const size = loadMonitorSize();
  if (!size) {
    return null;
  }

  return {
    widthMm: size[0],
    heightMm: size[1],
    widthPx: window.screen.width,
    heightPx: window.screen.height,
  };
};

/**
 * Tint helpers. Map editors store colors as "#AARRGGBB" (alpha first) or
 * "#RRGGBB"; both are accepted here, as is an already-parsed RGBA object.
 */

import type { Tint } from '../types';
import { createLogger } from './logger';

const log = createLogger('Color');

export const WHITE: Tint = Object.freeze({ r: 1, g: 1, b: 1, a: 1 });

const HEX_PATTERN = /^#?([0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

function channel(value: number, shift: number): number {
  return ((value >>> shift) & 0xff) / 255;
}

/** Parse "#RRGGBB" or "#AARRGGBB". Returns null when the string is not a color. */
export function parseHexTint(value: string): Tint | null {
  const match = HEX_PATTERN.exec(value.trim());
  if (!match?.[1]) return null;

  const digits = match[1];
  const packed = parseInt(digits, 16);
  if (digits.length === 6) {
    return { r: channel(packed, 16), g: channel(packed, 8), b: channel(packed, 0), a: 1 };
  }
  return {
    r: channel(packed, 16),
    g: channel(packed, 8),
    b: channel(packed, 0),
    a: channel(packed, 24),
  };
}

function isUnitNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function isTint(value: unknown): value is Tint {
  if (typeof value !== 'object' || value === null) return false;
  if (!('r' in value && 'g' in value && 'b' in value && 'a' in value)) return false;
  return isUnitNumber(value.r) && isUnitNumber(value.g) && isUnitNumber(value.b) && isUnitNumber(value.a);
}

/**
 * Read a tint from a map property value. Absent values give opaque white;
 * malformed values also fall back to white, with a warning.
 */
export function parseTint(value: unknown): Tint {
  if (value === undefined || value === null) return WHITE;

  if (typeof value === 'string') {
    const parsed = parseHexTint(value);
    if (parsed) return parsed;
  } else if (isTint(value)) {
    return { r: value.r, g: value.g, b: value.b, a: value.a };
  }

  log.warn('Ignoring malformed color value', value);
  return WHITE;
}

/**
 * Global constants for the actor pipeline.
 * All magic numbers live here, nowhere else.
 */

import { isLogLevel, type LogLevel } from './core/logger';

// ── World Units ─────────────────────────────────────────────────
export const APP_NAME = 'tilemap-actors';
/** Pixels-per-unit conversion: 16 map pixels = 1 world unit. */
export const UNIT_SCALE = 1 / 16;
export const WORLD_WIDTH = 16;
export const WORLD_HEIGHT = 9;

// ── Animation ───────────────────────────────────────────────────
/** 8 frames per second. */
export const DEFAULT_FRAME_DURATION = 1 / 8;

// ── Map Conventions ─────────────────────────────────────────────
export const ENTITY_LAYER_NAME = 'entities';
export const FOREGROUND_LAYER_PREFIX = 'fgd_';
export const DEFAULT_RENDER_LAYER = 0;

// ── ECS ─────────────────────────────────────────────────────────
export const MAX_ENTITIES = 10_000;

// ── Runtime Config Loading ─────────────────────────────────────
export interface GameConfig {
  unitScale: number;
  frameDuration: number;
  entityLayerName: string;
  foregroundLayerPrefix: string;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: GameConfig;
  errors: string[];
}

export const DEFAULT_GAME_CONFIG: Readonly<GameConfig> = Object.freeze({
  unitScale: UNIT_SCALE,
  frameDuration: DEFAULT_FRAME_DURATION,
  entityLayerName: ENTITY_LAYER_NAME,
  foregroundLayerPrefix: FOREGROUND_LAYER_PREFIX,
  logLevel: 'info',
});

const POSITIVE_NUMBER_FIELDS = [
  'unitScale',
  'frameDuration',
] as const;

const NON_EMPTY_STRING_FIELDS = [
  'entityLayerName',
  'foregroundLayerPrefix',
] as const;

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<GameConfig> = {},
): ConfigValidationResult {
  const config: GameConfig = { ...DEFAULT_GAME_CONFIG, ...overrides };
  const errors: string[] = [];

  for (const field of POSITIVE_NUMBER_FIELDS) {
    isPositiveNumber(config[field], field, errors);
  }

  for (const field of NON_EMPTY_STRING_FIELDS) {
    const value: unknown = config[field];
    if (typeof value !== 'string' || value.trim().length === 0) {
      errors.push(`${field} must be a non-empty string`);
    }
  }

  if (config.entityLayerName.startsWith(config.foregroundLayerPrefix)) {
    errors.push(
      `entityLayerName (${config.entityLayerName}) must not start with foregroundLayerPrefix (${config.foregroundLayerPrefix})`,
    );
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of debug, info, warn, error, got ${String(config.logLevel)}`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}

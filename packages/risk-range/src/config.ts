/**
 * @fileoverview Risk range configuration, defaults and validation.
 *
 * Configuration is passed by value into each stage; there is no
 * process-wide settings object.
 *
 * @module @riskband/risk-range/config
 */

import { InvalidConfigurationError } from '@riskband/contracts';
import type { BandOptions, IndicatorOptions } from './types.js';

/**
 * Complete pipeline configuration: indicator windows plus band settings.
 *
 * @example
 * ```typescript
 * const config: RiskRangeConfig = {
 *   ...DEFAULT_RISK_RANGE_CONFIG,
 *   z: 1.96,
 *   tiltGamma: -0.1
 * };
 * ```
 */
export interface RiskRangeConfig extends IndicatorOptions, BandOptions {}

/**
 * Default configuration values.
 */
export const DEFAULT_RISK_RANGE_CONFIG: Readonly<RiskRangeConfig> = {
  halfLife: 10,
  atrWindow: 14,
  volWindow: 20,
  vovWindow: 20,
  z: 1.65,
  wEwma: 0.5,
  wGk: 0.3,
  wAtr: 0.2,
  volAdj: 0.15,
  vovAdj: 0.1,
  tiltGamma: 0.1,
};

/**
 * Every configuration key, in declaration order.
 */
export const RISK_RANGE_CONFIG_KEYS = [
  'halfLife',
  'atrWindow',
  'volWindow',
  'vovWindow',
  'z',
  'wEwma',
  'wGk',
  'wAtr',
  'volAdj',
  'vovAdj',
  'tiltGamma',
] as const satisfies ReadonlyArray<keyof RiskRangeConfig>;

function requireFinite(field: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidConfigurationError(`${field} must be a finite number, got ${String(value)}`, {
      field,
      value,
    });
  }
}

function requirePositiveInteger(field: string, value: number): void {
  requireFinite(field, value);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(`${field} must be a positive integer, got ${value}`, {
      field,
      value,
    });
  }
}

/**
 * Validates the Indicator Engine windows.
 *
 * @throws {InvalidConfigurationError} If any window is not a positive integer
 */
export function validateIndicatorOptions(options: IndicatorOptions): void {
  requirePositiveInteger('halfLife', options.halfLife);
  requirePositiveInteger('atrWindow', options.atrWindow);
  requirePositiveInteger('volWindow', options.volWindow);
  requirePositiveInteger('vovWindow', options.vovWindow);
}

/**
 * Validates the Risk Range Builder settings.
 *
 * All-zero weights are accepted: the builder falls back to the default blend.
 *
 * @throws {InvalidConfigurationError} If z is not positive, a weight is
 *   negative, or any value is not finite
 */
export function validateBandOptions(options: BandOptions): void {
  requireFinite('z', options.z);
  if (options.z <= 0) {
    throw new InvalidConfigurationError(`z must be positive, got ${options.z}`, {
      field: 'z',
      value: options.z,
    });
  }

  for (const field of ['wEwma', 'wGk', 'wAtr'] as const) {
    const value = options[field];
    requireFinite(field, value);
    if (value < 0) {
      throw new InvalidConfigurationError(`${field} cannot be negative, got ${value}`, {
        field,
        value,
      });
    }
  }

  requireFinite('volAdj', options.volAdj);
  requireFinite('vovAdj', options.vovAdj);
  requireFinite('tiltGamma', options.tiltGamma);
}

/**
 * Validates a complete configuration.
 *
 * @throws {InvalidConfigurationError} On the first invalid field
 */
export function validateRiskRangeConfig(config: RiskRangeConfig): void {
  validateIndicatorOptions(config);
  validateBandOptions(config);
}

/**
 * Merges a partial configuration with defaults and validates the result.
 *
 * @example
 * ```typescript
 * const config = mergeRiskRangeConfig({ atrWindow: 10, z: 1.28 });
 * ```
 */
export function mergeRiskRangeConfig(partial: Partial<RiskRangeConfig> = {}): RiskRangeConfig {
  const merged: RiskRangeConfig = { ...DEFAULT_RISK_RANGE_CONFIG };

  // Explicit undefined keeps the default
  for (const key of RISK_RANGE_CONFIG_KEYS) {
    const value = partial[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  validateRiskRangeConfig(merged);
  return merged;
}

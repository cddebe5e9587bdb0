import { LogisticsMode } from '../interfaces/price-estimate.interface';

/**
 * Logistics multiplier configuration
 *
 * Prices are quoted at the wholesale stage. Other stages scale from it:
 * - farmgate: 0.90 (before transport and handling margins)
 * - wholesale: 1.00 (reference)
 * - retail: 1.20 (after retail margin)
 */
export const LOGISTICS_MULTIPLIERS: Record<LogisticsMode, number> = {
  farmgate: 0.9,
  wholesale: 1.0,
  retail: 1.2,
};

export const LOGISTICS_MODES: readonly LogisticsMode[] = ['farmgate', 'wholesale', 'retail'];

/** Multiplier used for modes missing from the table */
export const DEFAULT_LOGISTICS_MULTIPLIER = 1.0;

export function isLogisticsMode(mode: string): mode is LogisticsMode {
  return Object.prototype.hasOwnProperty.call(LOGISTICS_MULTIPLIERS, mode);
}

/**
 * Get multiplier for a logistics mode, returns the wholesale multiplier if not found
 */
export function getLogisticsMultiplier(mode: string): number {
  return isLogisticsMode(mode) ? LOGISTICS_MULTIPLIERS[mode] : DEFAULT_LOGISTICS_MULTIPLIER;
}

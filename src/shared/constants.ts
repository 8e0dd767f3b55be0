export const APP_VERSION = '0.1.0';

export const APP_NAME = 'tm-budget';

/**
 * Telemetry source packet envelope, in bits.
 * 6 octet packet header, 10 octet data field header, 4096 octets of data.
 */
export const PACKET_ENVELOPE = Object.freeze({
  headerBits: 6 * 8,
  dataHeaderBits: 10 * 8,
  maxPayloadBits: 4096 * 8,
} as const);

export const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Header shared by all user-requested X-ray data (levels 0-3), following
 * the packet data field header. Not part of the per-level formulas.
 */
export const COMMON_XRAY_USER_HEADER_BITS =
  8 + // SSID
  16 + // Reference to user TC packet ID
  16 + // Reference to user TC packet sequence control
  32 + // Unique data request number
  1 + 1 + 3 + 3 + // Spare, accumulator compression schema S/K/M
  1 + 1 + 3 + 3 + // Spare, trigger compression schema S/K/M
  48 + // SCET of first data sample
  16; // Number of samples

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;

export const ENV = {
  LOG_LEVEL: 'TM_BUDGET_LOG_LEVEL',
  LOG_FILE: 'TM_BUDGET_LOG_FILE'
} as const;

// Helper to build a plan entry, parameters other than the record count
import type { BudgetPlanEntry, ProductId, StructuralParameters } from './types/telemetry.types';

function entry(
  label: string,
  product: ProductId,
  integrationPeriodS: number,
  parameters: Partial<StructuralParameters> = {}
): BudgetPlanEntry {
  return { label, product, parameters, integrationPeriodS };
}

// Quicklook downlink plan: cadences and energy binning of the nominal QL configuration
export const DEFAULT_BUDGET_PLAN: readonly BudgetPlanEntry[] = [
  entry('lc', 'ql-light-curve', 4, { energies: 5 }),
  entry('bg', 'ql-background', 8, { energies: 5 }),
  entry('sp', 'ql-spectra', 32),
  entry('var', 'ql-variance', 4),
  entry('ff', 'ql-flare-flag-location', 8),
  entry('ftm', 'ql-flare-list', 288),
  entry('cal', 'ql-calibration-spectra', 56.25, { energies: 64 }),
];

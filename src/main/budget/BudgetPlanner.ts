/**
 * BudgetPlanner
 *
 * Runs the rate estimator for every entry of a downlink plan and sums the
 * per-product rates into one budget. Entries are independent: a failing
 * entry is recorded and the rest of the plan still runs.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  BudgetEntryResult,
  BudgetPlanEntry,
  BudgetReport,
  PacketEnvelope,
} from '@shared/types/telemetry.types';
import { DEFAULT_BUDGET_PLAN, PACKET_ENVELOPE, SECONDS_PER_DAY } from '@shared/constants';
import { estimateRate } from '../estimator/RateEstimator';
import { getErrorCode, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

function runEntry(entry: BudgetPlanEntry, envelope: PacketEnvelope): BudgetEntryResult {
  try {
    const projection = estimateRate(
      entry.product,
      entry.parameters,
      entry.integrationPeriodS,
      envelope
    );
    return { label: entry.label, product: entry.product, status: 'ok', projection };
  } catch (error) {
    logger.error(`Budget entry ${entry.label} (${entry.product}) failed:`, getErrorMessage(error));
    return {
      label: entry.label,
      product: entry.product,
      status: 'failed',
      error: { code: getErrorCode(error), message: getErrorMessage(error) },
    };
  }
}

export function runBudget(
  plan: readonly BudgetPlanEntry[] = DEFAULT_BUDGET_PLAN,
  envelope: PacketEnvelope = PACKET_ENVELOPE
): BudgetReport {
  logger.info(`Running downlink budget for ${plan.length} products`);

  const entries = plan.map((entry) => runEntry(entry, envelope));

  let totalBitsPerDay = 0;
  let failures = 0;
  for (const result of entries) {
    if (result.status === 'ok') {
      totalBitsPerDay += result.projection.totalBitsPerDay;
    } else {
      failures++;
    }
  }

  if (failures > 0) {
    logger.warn(`${failures} of ${plan.length} budget entries failed and are excluded from the total`);
  }

  return {
    id: uuidv4(),
    generatedAt: new Date().toISOString(),
    envelope: { ...envelope },
    entries,
    totalBitsPerDay,
    totalBitsPerSecond: totalBitsPerDay / SECONDS_PER_DAY,
    failures,
  };
}

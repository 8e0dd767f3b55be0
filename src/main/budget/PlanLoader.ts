/**
 * PlanLoader
 *
 * Reads a downlink plan from a JSON file:
 *
 *   { "entries": [ { "label": "lc", "product": "ql-light-curve",
 *                    "parameters": { "energies": 5 }, "integrationPeriodS": 4 } ] }
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { BudgetPlan } from '@shared/types/telemetry.types';
import { isProductId } from '../sizing/ProductCatalog';
import { PlanValidationError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const count = z.number().int().nonnegative();

const parametersSchema = z
  .object({
    samples: count.optional(),
    energies: count.optional(),
    pixelSets: count.optional(),
    detectorMasks: count.optional(),
  })
  .strict();

const entrySchema = z.object({
  label: z.string().min(1),
  product: z.string().refine(isProductId, { message: 'Unknown telemetry product' }),
  parameters: parametersSchema.default({}),
  integrationPeriodS: z.number().positive(),
});

const planSchema = z.object({
  entries: z.array(entrySchema).min(1),
});

/**
 * Validate an already parsed plan document.
 */
export function parseBudgetPlan(data: unknown): BudgetPlan {
  const result = planSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new PlanValidationError('Invalid budget plan', issues);
  }
  return result.data;
}

export async function loadBudgetPlan(filePath: string): Promise<BudgetPlan> {
  const content = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new PlanValidationError(`Budget plan ${filePath} is not valid JSON`, [getErrorMessage(error)]);
  }

  const plan = parseBudgetPlan(data);
  logger.info(`Loaded budget plan with ${plan.entries.length} entries from ${filePath}`);
  return plan;
}

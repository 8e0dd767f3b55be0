import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadBudgetPlan, parseBudgetPlan } from './PlanLoader';
import { PlanValidationError } from '../utils/errors';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

function validationIssues(data: unknown): string[] {
  try {
    parseBudgetPlan(data);
  } catch (error) {
    if (error instanceof PlanValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe('parseBudgetPlan', () => {
  it('accepts a well formed plan', () => {
    const plan = parseBudgetPlan({
      entries: [
        { label: 'lc', product: 'ql-light-curve', parameters: { energies: 5 }, integrationPeriodS: 4 },
        { label: 'cal', product: 'ql-calibration-spectra', parameters: { energies: 64 }, integrationPeriodS: 56.25 },
      ],
    });

    expect(plan.entries).toHaveLength(2);
    expect(plan.entries[1]).toEqual({
      label: 'cal',
      product: 'ql-calibration-spectra',
      parameters: { energies: 64 },
      integrationPeriodS: 56.25,
    });
  });

  it('defaults missing parameters to an empty set', () => {
    const plan = parseBudgetPlan({ entries: [{ label: 'var', product: 'ql-variance', integrationPeriodS: 4 }] });
    expect(plan.entries[0].parameters).toEqual({});
  });

  it('rejects an unknown product', () => {
    expect(
      validationIssues({ entries: [{ label: 'x', product: 'ql-nothing', integrationPeriodS: 4 }] })
    ).toEqual(['entries.0.product: Unknown telemetry product']);
  });

  it('rejects a non-positive integration period', () => {
    const issues = validationIssues({
      entries: [{ label: 'var', product: 'ql-variance', integrationPeriodS: 0 }],
    });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('entries.0.integrationPeriodS: ')).toBe(true);
  });

  it('rejects fractional and unknown parameters', () => {
    const issues = validationIssues({
      entries: [
        { label: 'lc', product: 'ql-light-curve', parameters: { energies: 2.5 }, integrationPeriodS: 4 },
        { label: 'bg', product: 'ql-background', parameters: { pixels: 3 }, integrationPeriodS: 8 },
      ],
    });
    expect(issues).toHaveLength(2);
    expect(issues[0].startsWith('entries.0.parameters.energies: ')).toBe(true);
    expect(issues[1].startsWith('entries.1.parameters: ')).toBe(true);
  });

  it('rejects an empty plan', () => {
    const issues = validationIssues({ entries: [] });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('entries: ')).toBe(true);
  });

  it('reports root level problems', () => {
    const issues = validationIssues('not a plan');
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('(root): ')).toBe(true);
  });

  it('includes the issues in the error message', () => {
    expect(() =>
      parseBudgetPlan({ entries: [{ label: 'x', product: 'ql-nothing', integrationPeriodS: 4 }] })
    ).toThrow('Invalid budget plan: entries.0.product: Unknown telemetry product');
  });
});

describe('loadBudgetPlan', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tm-budget-plan-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a plan file', async () => {
    const file = path.join(dir, 'plan.json');
    await fs.writeFile(
      file,
      JSON.stringify({ entries: [{ label: 'sp', product: 'ql-spectra', integrationPeriodS: 32 }] })
    );

    const plan = await loadBudgetPlan(file);
    expect(plan.entries).toEqual([
      { label: 'sp', product: 'ql-spectra', parameters: {}, integrationPeriodS: 32 },
    ]);
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ entries: ');

    await expect(loadBudgetPlan(file)).rejects.toThrow(PlanValidationError);
    await expect(loadBudgetPlan(file)).rejects.toThrow(`Budget plan ${file} is not valid JSON`);
  });

  it('rejects a JSON file that is not a plan', async () => {
    const file = path.join(dir, 'empty.json');
    await fs.writeFile(file, '{}');

    await expect(loadBudgetPlan(file)).rejects.toThrow(PlanValidationError);
  });

  it('propagates a missing file', async () => {
    await expect(loadBudgetPlan(path.join(dir, 'missing.json'))).rejects.toThrow(/ENOENT/);
  });
});

import { DEFAULT_BUDGET_PLAN } from '@shared/constants';
import { runBudget } from '../budget/BudgetPlanner';
import { loadBudgetPlan } from '../budget/PlanLoader';
import { describeLayout, listProducts, sizeProduct } from '../sizing/ProductCatalog';
import {
  formatBudgetReport,
  formatCatalog,
  formatLayout,
  formatSizeResult,
} from '../report/formatReport';
import { getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { USAGE, parseArgs } from './args';

export interface CliOutput {
  write: (text: string) => void;
}

const stdout: CliOutput = {
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
};

/**
 * Run one CLI invocation. Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], output: CliOutput = stdout): Promise<number> {
  try {
    const args = parseArgs(argv);

    switch (args.command) {
      case 'budget': {
        const plan = args.planFile
          ? (await loadBudgetPlan(args.planFile)).entries
          : DEFAULT_BUDGET_PLAN;
        const report = runBudget(plan);
        output.write(args.json ? JSON.stringify(report, null, 2) : formatBudgetReport(report));
        return report.failures > 0 ? 1 : 0;
      }
      case 'size': {
        const product = args.product ?? '';
        const result = sizeProduct(product, args.parameters);
        output.write(
          args.json ? JSON.stringify({ product, ...result }, null, 2) : formatSizeResult(product, result)
        );
        return 0;
      }
      case 'describe': {
        const description = describeLayout(args.product ?? '', args.parameters);
        output.write(args.json ? JSON.stringify(description, null, 2) : formatLayout(description));
        return 0;
      }
      case 'catalog': {
        output.write(formatCatalog(listProducts()));
        return 0;
      }
      case 'help':
        output.write(USAGE);
        return 0;
    }
  } catch (error) {
    logger.error(getErrorMessage(error));
    return 1;
  }
}

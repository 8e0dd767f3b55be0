import type { StructuralParameters } from '@shared/types/telemetry.types';
import { TelemetryBudgetError } from '../utils/errors';

export type CliCommand = 'budget' | 'size' | 'describe' | 'catalog' | 'help';

const COMMANDS: readonly CliCommand[] = ['budget', 'size', 'describe', 'catalog', 'help'];

/** Command line flag → structural parameter */
export const PARAMETER_FLAGS = {
  '--samples': 'samples',
  '--energies': 'energies',
  '--pixel-sets': 'pixelSets',
  '--detector-masks': 'detectorMasks',
} as const;

type ParameterFlag = keyof typeof PARAMETER_FLAGS;

export interface CliArgs {
  command: CliCommand;
  /** Product id for size / describe */
  product?: string;
  planFile?: string;
  json: boolean;
  parameters: Partial<StructuralParameters>;
}

export class CliUsageError extends TelemetryBudgetError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'CliUsageError';
  }
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((c) => c === value);
}

function isParameterFlag(value: string): value is ParameterFlag {
  return Object.prototype.hasOwnProperty.call(PARAMETER_FLAGS, value);
}

function parseCount(flag: string, raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new CliUsageError(`${flag} expects a non-negative integer, got ${raw ?? 'nothing'}`);
  }
  return parseInt(raw, 10);
}

/**
 * Parse arguments after the executable and script name.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'help', json: false, parameters: {} };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--json') {
      args.json = true;
    } else if (arg === '--help' || arg === '-h') {
      args.command = 'help';
      return args;
    } else if (arg === '--plan') {
      const value = argv[++i];
      if (value === undefined) throw new CliUsageError('--plan expects a file path');
      args.planFile = value;
    } else if (isParameterFlag(arg)) {
      args.parameters[PARAMETER_FLAGS[arg]] = parseCount(arg, argv[++i]);
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, product] = positional;
  if (command === undefined) return args;
  if (!isCommand(command)) {
    throw new CliUsageError(`Unknown command: ${command}`);
  }
  args.command = command;

  if (command === 'size' || command === 'describe') {
    if (product === undefined) {
      throw new CliUsageError(`${command} expects a product id`);
    }
    args.product = product;
  }

  return args;
}

export const USAGE = [
  'Usage: tm-budget <command> [options]',
  '',
  'Commands:',
  '  budget [--plan <file>] [--json]   project the daily downlink budget',
  '  size <product> [parameters]       fixed and variable bits of a product',
  '  describe <product> [parameters]   field layout of a product',
  '  catalog                           list products',
  '',
  'Parameters:',
  '  --samples N  --energies N  --pixel-sets N  --detector-masks N',
].join('\n');

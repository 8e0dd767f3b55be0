import type { ParameterName, ProductId } from '@shared/types/telemetry.types';

export class TelemetryBudgetError extends Error {
  constructor(
    message: string,
    public code: string = 'TELEMETRY_BUDGET_ERROR',
    public details?: unknown
  ) {
    super(message);
    this.name = 'TelemetryBudgetError';
  }
}

/**
 * Integration period does not tile a day exactly.
 */
export class NonDivisibleCadenceError extends TelemetryBudgetError {
  constructor(public integrationPeriodS: number) {
    super(
      `Integration period ${integrationPeriodS}s does not evenly divide the 86400 seconds of a day`,
      'NON_DIVISIBLE_CADENCE'
    );
    this.name = 'NonDivisibleCadenceError';
  }
}

/**
 * Record size is zero, negative, or too large for a single record to fit.
 */
export class DegenerateRecordSizeError extends TelemetryBudgetError {
  constructor(
    message: string,
    public variableBits: number,
    public availableBits: number
  ) {
    super(message, 'DEGENERATE_RECORD_SIZE', { variableBits, availableBits });
    this.name = 'DegenerateRecordSizeError';
  }
}

export class FixedOverheadOverflowError extends TelemetryBudgetError {
  constructor(
    public fixedBits: number,
    public capacityBits: number
  ) {
    super(
      `Fixed header of ${fixedBits} bits leaves no room in a ${capacityBits} bit payload`,
      'FIXED_OVERHEAD_OVERFLOW',
      { fixedBits, capacityBits }
    );
    this.name = 'FixedOverheadOverflowError';
  }
}

export class MissingParameterError extends TelemetryBudgetError {
  constructor(
    public product: ProductId,
    public missing: ParameterName[]
  ) {
    super(`Product ${product} requires parameter(s): ${missing.join(', ')}`, 'MISSING_PARAMETER', {
      product,
      missing,
    });
    this.name = 'MissingParameterError';
  }
}

export class UnknownProductError extends TelemetryBudgetError {
  constructor(public product: string) {
    super(`Unknown telemetry product: ${product}`, 'UNKNOWN_PRODUCT');
    this.name = 'UnknownProductError';
  }
}

export class PlanValidationError extends TelemetryBudgetError {
  constructor(message: string, public issues: string[] = []) {
    // Surface the individual issues, not just "Invalid budget plan"
    const fullMessage = issues.length > 0 ? `${message}: ${issues.join('; ')}` : message;
    super(fullMessage, 'INVALID_PLAN', issues);
    this.name = 'PlanValidationError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string {
  if (error instanceof TelemetryBudgetError) {
    return error.code;
  }
  return 'UNEXPECTED_ERROR';
}

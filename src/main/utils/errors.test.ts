import { describe, it, expect } from 'vitest';
import {
  DegenerateRecordSizeError,
  FixedOverheadOverflowError,
  NonDivisibleCadenceError,
  PlanValidationError,
  TelemetryBudgetError,
  UnknownProductError,
  getErrorCode,
  getErrorMessage,
  isError,
} from './errors';

describe('error classes', () => {
  it('carry a code and keep the base class', () => {
    const error = new NonDivisibleCadenceError(7);
    expect(error).toBeInstanceOf(TelemetryBudgetError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('NON_DIVISIBLE_CADENCE');
    expect(error.name).toBe('NonDivisibleCadenceError');
    expect(error.integrationPeriodS).toBe(7);
  });

  it('describe the packing failure', () => {
    const overflow = new FixedOverheadOverflowError(40000, 32768);
    expect(overflow.message).toBe('Fixed header of 40000 bits leaves no room in a 32768 bit payload');
    expect(overflow.details).toEqual({ fixedBits: 40000, capacityBits: 32768 });

    const degenerate = new DegenerateRecordSizeError('too big', 1000, 900);
    expect(degenerate.code).toBe('DEGENERATE_RECORD_SIZE');
    expect(degenerate.details).toEqual({ variableBits: 1000, availableBits: 900 });
  });

  it('joins plan issues into the message', () => {
    expect(new PlanValidationError('Invalid budget plan', ['a: x', 'b: y']).message).toBe(
      'Invalid budget plan: a: x; b: y'
    );
    expect(new PlanValidationError('Invalid budget plan').message).toBe('Invalid budget plan');
  });
});

describe('error helpers', () => {
  it('reads messages from errors and other values', () => {
    expect(isError(new Error('boom'))).toBe(true);
    expect(isError('boom')).toBe(false);
    expect(getErrorMessage(new UnknownProductError('x'))).toBe('Unknown telemetry product: x');
    expect(getErrorMessage(42)).toBe('42');
  });

  it('falls back to a generic code for foreign errors', () => {
    expect(getErrorCode(new UnknownProductError('x'))).toBe('UNKNOWN_PRODUCT');
    expect(getErrorCode(new TypeError('boom'))).toBe('UNEXPECTED_ERROR');
    expect(getErrorCode(new TelemetryBudgetError('boom'))).toBe('TELEMETRY_BUDGET_ERROR');
  });
});

import { describe, it, expect } from 'vitest';
import { CliUsageError, parseArgs } from './args';

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help', json: false, parameters: {} });
  });

  it('parses the budget command with a plan file', () => {
    expect(parseArgs(['budget', '--plan', 'plan.json', '--json'])).toEqual({
      command: 'budget',
      planFile: 'plan.json',
      json: true,
      parameters: {},
    });
  });

  it('parses a product and its parameters', () => {
    expect(
      parseArgs(['size', 'xray-l1', '--energies', '4', '--pixel-sets', '2', '--detector-masks', '12'])
    ).toEqual({
      command: 'size',
      product: 'xray-l1',
      json: false,
      parameters: { energies: 4, pixelSets: 2, detectorMasks: 12 },
    });
  });

  it('accepts flags before the command', () => {
    const args = parseArgs(['--samples', '3', 'describe', 'aspect']);
    expect(args.command).toBe('describe');
    expect(args.product).toBe('aspect');
    expect(args.parameters).toEqual({ samples: 3 });
  });

  it('stops at --help', () => {
    expect(parseArgs(['size', '--help', '--bogus']).command).toBe('help');
    expect(parseArgs(['-h']).command).toBe('help');
  });

  it('rejects malformed counts', () => {
    expect(() => parseArgs(['size', 'aspect', '--samples', '-1'])).toThrow(
      '--samples expects a non-negative integer, got -1'
    );
    expect(() => parseArgs(['size', 'aspect', '--samples', '2.5'])).toThrow(CliUsageError);
    expect(() => parseArgs(['size', 'aspect', '--samples'])).toThrow(
      '--samples expects a non-negative integer, got nothing'
    );
  });

  it('rejects unknown options and commands', () => {
    expect(() => parseArgs(['budget', '--fast'])).toThrow('Unknown option: --fast');
    expect(() => parseArgs(['estimate'])).toThrow('Unknown command: estimate');
  });

  it('requires a product for size and describe', () => {
    expect(() => parseArgs(['size'])).toThrow('size expects a product id');
    expect(() => parseArgs(['describe'])).toThrow('describe expects a product id');
  });

  it('requires a path after --plan', () => {
    expect(() => parseArgs(['budget', '--plan'])).toThrow('--plan expects a file path');
  });

  it('tags usage errors with their code', () => {
    let caught: unknown;
    try {
      parseArgs(['nope']);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CliUsageError);
    if (caught instanceof CliUsageError) {
      expect(caught.code).toBe('USAGE_ERROR');
    }
  });
});

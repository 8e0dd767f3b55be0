import type {
  BitField,
  LayoutSection,
  PacketLayout,
  ParameterName,
  ProductId,
  SizeResult,
  StructuralParameters,
} from '@shared/types/telemetry.types';
import { MissingParameterError } from '../utils/errors';

export function field(name: string, bits: number): BitField {
  return { name, bits };
}

export function sumBits(fields: readonly BitField[]): number {
  return fields.reduce((sum, f) => sum + f.bits, 0);
}

/** Fields of a block that occurs a fixed number of times */
export function repeatFields(fields: readonly BitField[], times: number): BitField[] {
  const repeated: BitField[] = [];
  for (let i = 0; i < times; i++) {
    repeated.push(...fields);
  }
  return repeated;
}

/**
 * Group fields into a layout section, optionally repeated once per unit
 * of each listed parameter.
 */
export function section(
  name: string,
  fields: readonly BitField[],
  repeat: readonly ParameterName[] = []
): LayoutSection {
  return { name, fields, repeat };
}

/**
 * Assert that every parameter a product reads is present.
 * Nothing is defaulted: an absent parameter is a caller error.
 */
export function assertParameters<P extends ParameterName>(
  product: ProductId,
  params: Partial<StructuralParameters>,
  names: readonly P[]
): asserts params is Partial<StructuralParameters> & Pick<StructuralParameters, P> {
  const missing = names.filter((name) => params[name] === undefined);
  if (missing.length > 0) {
    throw new MissingParameterError(product, missing);
  }
}

function sectionMultiplier(
  product: ProductId,
  sec: LayoutSection,
  params: Partial<StructuralParameters>
): number {
  assertParameters(product, params, sec.repeat);
  const counts = params;
  return sec.repeat.reduce((multiplier, name) => multiplier * counts[name], 1);
}

/**
 * Evaluate a layout table for a parameter set.
 * Used to list a product's layout; the product formulas are the reference.
 */
export function evaluateLayout(
  product: ProductId,
  layout: PacketLayout,
  params: Partial<StructuralParameters>
): SizeResult {
  const total = (sections: readonly LayoutSection[]) =>
    sections.reduce(
      (sum, sec) => sum + sectionMultiplier(product, sec, params) * sumBits(sec.fields),
      0
    );

  return {
    fixedBits: total(layout.fixed),
    variableBits: total(layout.variable),
  };
}

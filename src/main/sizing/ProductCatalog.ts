import type {
  CatalogEntry,
  PacketLayout,
  ParameterName,
  ProductDefinition,
  ProductId,
  SizeResult,
  StructuralParameters,
} from '@shared/types/telemetry.types';
import { UnknownProductError } from '../utils/errors';
import { assertParameters, evaluateLayout } from './fields';
import { ASPECT, SPECTROGRAM, XRAY_LEVEL0, XRAY_LEVEL1, XRAY_LEVEL2, XRAY_LEVEL3 } from './bulkScience';
import {
  BACKGROUND,
  CALIBRATION_SPECTRA,
  FLARE_FLAG_LOCATION,
  FLARE_LIST,
  LIGHT_CURVE,
  SPECTRA,
  VARIANCE,
} from './quicklook';

function toCatalogEntry<P extends ParameterName>(definition: ProductDefinition<P>): CatalogEntry {
  return {
    ...definition,
    size: (params) => {
      assertParameters(definition.id, params, definition.parameters);
      return definition.size(params);
    },
  };
}

/** Product id → definition. Catalog order is report order. */
export const PRODUCT_CATALOG: Readonly<Record<ProductId, CatalogEntry>> = {
  'xray-l0': toCatalogEntry(XRAY_LEVEL0),
  'xray-l1': toCatalogEntry(XRAY_LEVEL1),
  'xray-l2': toCatalogEntry(XRAY_LEVEL2),
  'xray-l3': toCatalogEntry(XRAY_LEVEL3),
  spectrogram: toCatalogEntry(SPECTROGRAM),
  aspect: toCatalogEntry(ASPECT),
  'ql-light-curve': toCatalogEntry(LIGHT_CURVE),
  'ql-background': toCatalogEntry(BACKGROUND),
  'ql-variance': toCatalogEntry(VARIANCE),
  'ql-spectra': toCatalogEntry(SPECTRA),
  'ql-flare-flag-location': toCatalogEntry(FLARE_FLAG_LOCATION),
  'ql-flare-list': toCatalogEntry(FLARE_LIST),
  'ql-calibration-spectra': toCatalogEntry(CALIBRATION_SPECTRA),
};

export const PRODUCT_IDS = Object.keys(PRODUCT_CATALOG).filter(isProductId);

export function isProductId(value: string): value is ProductId {
  return Object.prototype.hasOwnProperty.call(PRODUCT_CATALOG, value);
}

export function getProduct(id: string): CatalogEntry {
  if (!isProductId(id)) {
    throw new UnknownProductError(id);
  }
  return PRODUCT_CATALOG[id];
}

export function listProducts(): CatalogEntry[] {
  return PRODUCT_IDS.map((id) => PRODUCT_CATALOG[id]);
}

/**
 * Size a product by id.
 * Every parameter the product reads must be present; extra ones are ignored.
 */
export function sizeProduct(id: string, params: Partial<StructuralParameters>): SizeResult {
  return getProduct(id).size(params);
}

export interface LayoutDescription {
  product: CatalogEntry;
  layout: PacketLayout;
  /** Totals of the layout tables for the given parameters */
  totals: SizeResult;
}

export function describeLayout(id: string, params: Partial<StructuralParameters>): LayoutDescription {
  const product = getProduct(id);
  return {
    product,
    layout: product.layout,
    totals: evaluateLayout(product.id, product.layout, params),
  };
}

/**
 * Telemetry product identifiers.
 * Bulk science products come from user data requests, quicklook products are
 * generated continuously onboard.
 */
export type BulkProductId =
  | 'xray-l0'
  | 'xray-l1'
  | 'xray-l2'
  | 'xray-l3'
  | 'spectrogram'
  | 'aspect';

export type QuicklookProductId =
  | 'ql-light-curve'
  | 'ql-background'
  | 'ql-variance'
  | 'ql-spectra'
  | 'ql-flare-flag-location'
  | 'ql-flare-list'
  | 'ql-calibration-spectra';

export type ProductId = BulkProductId | QuicklookProductId;

export type ProductFamily = 'bulk' | 'quicklook';

/** Structural parameters a product formula can depend on */
export type ParameterName = 'samples' | 'energies' | 'pixelSets' | 'detectorMasks';

export interface StructuralParameters {
  /** Number of data samples (or flares, for the flare list) */
  samples: number;
  /** Number of energy bins / energy groups */
  energies: number;
  /** Number of pixel sets */
  pixelSets: number;
  /** Number of detector masks */
  detectorMasks: number;
}

/**
 * Parameters restricted to the names in P.
 * Every name a formula reads is required; nothing is defaulted.
 */
export type ParametersOf<P extends ParameterName> = Pick<StructuralParameters, P>;

/**
 * Bit cost of one packet layout for a given parameter set
 */
export interface SizeResult {
  /** Constant header bits */
  fixedBits: number;
  /** Bits of the repeated part for the given parameters */
  variableBits: number;
}

/** A single named field of the ICD packet layout */
export interface BitField {
  name: string;
  bits: number;
}

/**
 * A block of fields repeated once per unit of the listed parameters
 * (product of all of them). An empty `repeat` means the block occurs once.
 */
export interface LayoutSection {
  name: string;
  repeat: readonly ParameterName[];
  fields: readonly BitField[];
}

export interface PacketLayout {
  fixed: readonly LayoutSection[];
  variable: readonly LayoutSection[];
}

export interface ProductDefinition<P extends ParameterName = ParameterName> {
  id: ProductId;
  /** Human readable product name */
  name: string;
  family: ProductFamily;
  /** Parameters the formulas read */
  parameters: readonly P[];
  /** Parameter counting the repeated records of one packet */
  recordParameter: P;
  /** Common user-request header carried by bulk X-ray data, listed separately */
  commonHeaderBits?: number;
  size: (params: ParametersOf<P>) => SizeResult;
  layout: PacketLayout;
}

/**
 * Catalog view of a product definition. `size` accepts any parameter set
 * and rejects one that lacks a parameter the product reads.
 */
export interface CatalogEntry extends Omit<ProductDefinition, 'size'> {
  size: (params: Partial<StructuralParameters>) => SizeResult;
}

/**
 * Physical packet envelope in bits
 */
export interface PacketEnvelope {
  /** Source packet header */
  headerBits: number;
  /** Packet data field header */
  dataHeaderBits: number;
  /** Maximum application data per packet */
  maxPayloadBits: number;
}

export interface PackingOutcome {
  capacityBits: number;
  fixedBits: number;
  /** Payload left after the fixed header */
  availableBits: number;
  variableBits: number;
  recordsPerPacket: number;
  /** Unused bits after packing whole records */
  remainderBits: number;
}

export interface RateProjection extends PackingOutcome {
  product: ProductId;
  integrationPeriodS: number;
  recordsPerDay: number;
  /**
   * Average packet rate over one day. Real-valued, so it is not a count of
   * packets that could be scheduled for downlink.
   */
  packetsPerDay: number;
  totalBitsPerDay: number;
  bitsPerSecond: number;
  /** Packet header + data field header bits at the projected packet rate */
  envelopeBitsPerDay: number;
}

export interface BudgetPlanEntry {
  /** Short label used in reports */
  label: string;
  product: ProductId;
  parameters: Partial<StructuralParameters>;
  integrationPeriodS: number;
}

export interface BudgetPlan {
  entries: BudgetPlanEntry[];
}

export type BudgetEntryResult =
  | { label: string; product: ProductId; status: 'ok'; projection: RateProjection }
  | { label: string; product: ProductId; status: 'failed'; error: { code: string; message: string } };

export interface BudgetReport {
  id: string;
  generatedAt: string;
  envelope: PacketEnvelope;
  entries: BudgetEntryResult[];
  totalBitsPerDay: number;
  totalBitsPerSecond: number;
  failures: number;
}

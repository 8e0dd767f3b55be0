/**
 * Bulk science data packet sizes.
 *
 * - X-ray level 0: uncompressed counts per (pixel, detector, energy)
 * - X-ray level 1: triggers and combined pixel counts compressed to 1 octet
 * - X-ray level 2: same wire structure as level 1, summed over pixels
 * - X-ray level 3: counts transformed to visibilities
 * - Spectrogram
 * - Aspect
 *
 * Field widths follow the instrument TM/TC ICD. The common user-request
 * header (COMMON_XRAY_USER_HEADER_BITS) precedes these structures and is
 * not included in them.
 */
import type {
  PacketLayout,
  ParametersOf,
  ProductDefinition,
  SizeResult,
} from '@shared/types/telemetry.types';
import { COMMON_XRAY_USER_HEADER_BITS } from '@shared/constants';
import { field, repeatFields, section, sumBits } from './fields';

const TRIGGER_ACCUMULATORS = field('Trigger accumulators (15 x 1 octet)', 15 * 8);

// ---- X-ray level 0 ----

const L0_HEADER = [
  field('Starting time', 2 * 8),
  field('RCR', 1 * 8),
  field('Integration time', 2 * 8),
  field('Spare', 4),
  field('Pixel mask', 12),
  field('Detector mask', 32),
  TRIGGER_ACCUMULATORS,
  field('Number of samples', 2 * 8),
];

const L0_SAMPLE = [
  field('Pixel ID', 4),
  field('Detector index', 5),
  field('Energy ID', 5),
  field('Continuation bits', 2),
  // Worst case: 2 octets per count
  field('Counts', 2 * 8),
];

export function xrayLevel0({ samples }: ParametersOf<'samples'>): SizeResult {
  return {
    fixedBits: sumBits(L0_HEADER),
    variableBits: samples * sumBits(L0_SAMPLE),
  };
}

// ---- X-ray level 1 / 2 ----

const L1_HEADER = [
  field('Starting time', 2 * 8),
  field('RCR', 1 * 8),
  field('Number of pixel sets', 1 * 8),
];

const L1_PIXEL_SET = [field('Spare', 4), field('Pixel mask', 12)];

const L1_HEADER_TAIL = [
  field('Detector masks', 32),
  field('Integration time', 2 * 8),
  TRIGGER_ACCUMULATORS,
  field('Number of energies', 1 * 8),
];

const ENERGY_BOUNDS = [
  field('Spare', 3),
  field('E1 low bound', 5),
  field('Spare', 3),
  field('E2 high bound', 5),
];

const L1_ENERGY = [...ENERGY_BOUNDS, field('Number of data elements', 16)];

const L1_COMPRESSED_COUNT = [field('Compressed counts', 8)];

type LevelOneParameters = ParametersOf<'pixelSets' | 'energies' | 'detectorMasks'>;

export function xrayLevel1({ pixelSets, energies, detectorMasks }: LevelOneParameters): SizeResult {
  const fixedBits =
    sumBits(L1_HEADER) + pixelSets * sumBits(L1_PIXEL_SET) + sumBits(L1_HEADER_TAIL);

  const variableBits =
    energies *
    (sumBits(L1_ENERGY) + pixelSets * detectorMasks * sumBits(L1_COMPRESSED_COUNT));

  return { fixedBits, variableBits };
}

/** Level 2 shares the level 1 packet structure. */
export function xrayLevel2(params: LevelOneParameters): SizeResult {
  return xrayLevel1(params);
}

// ---- X-ray level 3 ----

const L3_HEADER = [field('Starting time', 2 * 8), field('RCR', 1 * 8), field('Duration', 1 * 8)];

const L3_PIXEL_MASK = [field('Spare', 4), field('Pixel mask', 12)];
const L3_PIXEL_MASK_COUNT = 5;

const L3_HEADER_TAIL = [
  field('Detector mask', 32),
  TRIGGER_ACCUMULATORS,
  field('Number of energy groups', 1 * 8),
];

const L3_ENERGY = [...ENERGY_BOUNDS, field('Flux', 8), field('Number of detectors', 8)];

const L3_VISIBILITY = [
  field('Detector ID', 8),
  field('Real visibility component', 8),
  field('Imaginary visibility component', 8),
];

export function xrayLevel3({
  energies,
  detectorMasks,
}: ParametersOf<'energies' | 'detectorMasks'>): SizeResult {
  const fixedBits =
    sumBits(L3_HEADER) + L3_PIXEL_MASK_COUNT * sumBits(L3_PIXEL_MASK) + sumBits(L3_HEADER_TAIL);

  const variableBits = energies * (sumBits(L3_ENERGY) + detectorMasks * sumBits(L3_VISIBILITY));

  return { fixedBits, variableBits };
}

// ---- Spectrogram ----

const SPECTROGRAM_HEADER = [
  field('Spare', 4),
  field('Pixel mask', 12),
  field('Detector mask', 4 * 8),
  field('RCR', 1 * 8),
  field('Spare', 1),
  field('Emin', 5),
  field('Emax', 5),
  field('E unit', 5),
  field('Number of samples', 2 * 8),
  field('Closing time offset', 2 * 8),
];

const SPECTROGRAM_SAMPLE = [
  field('Delta time', 2 * 8),
  field('Compressed combined trigger count', 1 * 8),
  field('Number of energies', 1 * 8),
];

const SPECTROGRAM_COUNT = [field('Compressed counts', 8)];

export function spectrogram({ samples, energies }: ParametersOf<'samples' | 'energies'>): SizeResult {
  return {
    fixedBits: sumBits(SPECTROGRAM_HEADER),
    variableBits: samples * (sumBits(SPECTROGRAM_SAMPLE) + energies * sumBits(SPECTROGRAM_COUNT)),
  };
}

// ---- Aspect ----

const ASPECT_HEADER = [
  field('SSID', 1 * 8),
  field('SCET coarse time', 4 * 8),
  field('SCET fine time', 2 * 8),
  field('Summing value', 1 * 8),
  field('Number of samples', 2 * 8),
];

const ASPECT_SAMPLE = [
  field('ChA diode 0 voltage', 2 * 8),
  field('ChA diode 1 voltage', 2 * 8),
  field('ChB diode 0 voltage', 2 * 8),
  field('ChB diode 1 voltage', 2 * 8),
];

export function aspect({ samples }: ParametersOf<'samples'>): SizeResult {
  return {
    fixedBits: sumBits(ASPECT_HEADER),
    variableBits: samples * sumBits(ASPECT_SAMPLE),
  };
}

// ---- Definitions ----

const LEVEL_ONE_LAYOUT: PacketLayout = {
  fixed: [
    section('Header', L1_HEADER),
    section('Pixel set', L1_PIXEL_SET, ['pixelSets']),
    section('Header (continued)', L1_HEADER_TAIL),
  ],
  variable: [
    section('Energy bin', L1_ENERGY, ['energies']),
    section('Counts', L1_COMPRESSED_COUNT, ['energies', 'pixelSets', 'detectorMasks']),
  ],
};

export const XRAY_LEVEL0: ProductDefinition<'samples'> = {
  id: 'xray-l0',
  name: 'X-ray level 0',
  family: 'bulk',
  parameters: ['samples'],
  recordParameter: 'samples',
  commonHeaderBits: COMMON_XRAY_USER_HEADER_BITS,
  size: xrayLevel0,
  layout: {
    fixed: [section('Header', L0_HEADER)],
    variable: [section('Sample', L0_SAMPLE, ['samples'])],
  },
};

export const XRAY_LEVEL1: ProductDefinition<'pixelSets' | 'energies' | 'detectorMasks'> = {
  id: 'xray-l1',
  name: 'X-ray level 1',
  family: 'bulk',
  parameters: ['pixelSets', 'energies', 'detectorMasks'],
  recordParameter: 'energies',
  commonHeaderBits: COMMON_XRAY_USER_HEADER_BITS,
  size: xrayLevel1,
  layout: LEVEL_ONE_LAYOUT,
};

export const XRAY_LEVEL2: ProductDefinition<'pixelSets' | 'energies' | 'detectorMasks'> = {
  ...XRAY_LEVEL1,
  id: 'xray-l2',
  name: 'X-ray level 2',
  size: xrayLevel2,
};

export const XRAY_LEVEL3: ProductDefinition<'energies' | 'detectorMasks'> = {
  id: 'xray-l3',
  name: 'X-ray level 3',
  family: 'bulk',
  parameters: ['energies', 'detectorMasks'],
  recordParameter: 'energies',
  commonHeaderBits: COMMON_XRAY_USER_HEADER_BITS,
  size: xrayLevel3,
  layout: {
    fixed: [
      section('Header', L3_HEADER),
      section(`Pixel masks (${L3_PIXEL_MASK_COUNT}x)`, repeatFields(L3_PIXEL_MASK, L3_PIXEL_MASK_COUNT)),
      section('Header (continued)', L3_HEADER_TAIL),
    ],
    variable: [
      section('Energy group', L3_ENERGY, ['energies']),
      section('Visibility', L3_VISIBILITY, ['energies', 'detectorMasks']),
    ],
  },
};

export const SPECTROGRAM: ProductDefinition<'samples' | 'energies'> = {
  id: 'spectrogram',
  name: 'Spectrogram',
  family: 'bulk',
  parameters: ['samples', 'energies'],
  recordParameter: 'samples',
  size: spectrogram,
  layout: {
    fixed: [section('Header', SPECTROGRAM_HEADER)],
    variable: [
      section('Sample', SPECTROGRAM_SAMPLE, ['samples']),
      section('Counts', SPECTROGRAM_COUNT, ['samples', 'energies']),
    ],
  },
};

export const ASPECT: ProductDefinition<'samples'> = {
  id: 'aspect',
  name: 'Aspect',
  family: 'bulk',
  parameters: ['samples'],
  recordParameter: 'samples',
  size: aspect,
  layout: {
    fixed: [section('Header', ASPECT_HEADER)],
    variable: [section('Sample', ASPECT_SAMPLE, ['samples'])],
  },
};

/**
 * Quicklook (QL) packet sizes: light curves, background, variance, spectra,
 * flare flag and location, flare list / TM management status and energy
 * calibration spectra.
 *
 * Field widths follow the instrument TM/TC ICD.
 */
import type {
  BitField,
  ParametersOf,
  ProductDefinition,
  SizeResult,
} from '@shared/types/telemetry.types';
import { field, repeatFields, section, sumBits } from './fields';

// ---- Shared header blocks ----

const QL_TIME_HEADER = [
  field('SSID', 1 * 8),
  field('SCET coarse time', 4 * 8),
  field('SCET fine time', 2 * 8),
  field('Integration time', 2 * 8),
];

/** Compression schema S/K/M triplet */
function compressionSchema(label: string): BitField[] {
  return [field(`${label} schema S`, 1), field(`${label} schema K`, 3), field(`${label} schema M`, 3)];
}

const ENERGY_BIN_MASK = [
  field('Energy bin mask upper boundary', 1),
  field('Energy bin mask lower boundary', 4 * 8),
];

const DATA_POINT_COUNT = field('Number of data points', 2 * 8);

const COMPRESSED_OCTET = 1 * 8;

// ---- Light curve ----

const LIGHT_CURVE_HEADER = [
  ...QL_TIME_HEADER,
  field('Detector mask', 4 * 8),
  field('Spare', 4),
  field('Pixel mask', 12),
  field('Spare', 1),
  ...compressionSchema('Light curve'),
  ...compressionSchema('Trigger'),
  ...ENERGY_BIN_MASK,
  field('Number of energies', 1 * 8),
];

const LIGHT_CURVE_ENERGY = [DATA_POINT_COUNT];

const LIGHT_CURVE_TRAILER = [
  field('Number of trigger data points', 2 * 8),
  field('Number of RCR data points', 2 * 8),
];

const LIGHT_CURVE_POINT = [field('Compressed light curve', COMPRESSED_OCTET)];

const LIGHT_CURVE_SAMPLE = [
  field('Compressed trigger', COMPRESSED_OCTET),
  field('RCR', COMPRESSED_OCTET),
];

export function lightCurve({ energies, samples }: ParametersOf<'energies' | 'samples'>): SizeResult {
  return {
    fixedBits:
      sumBits(LIGHT_CURVE_HEADER) + energies * sumBits(LIGHT_CURVE_ENERGY) + sumBits(LIGHT_CURVE_TRAILER),
    variableBits: energies * samples * sumBits(LIGHT_CURVE_POINT) + samples * sumBits(LIGHT_CURVE_SAMPLE),
  };
}

// ---- Background ----

const BACKGROUND_HEADER = [
  ...QL_TIME_HEADER,
  ...compressionSchema('Background'),
  ...compressionSchema('Trigger'),
  ...ENERGY_BIN_MASK,
  field('Spare', 1),
  field('Number of energies', 1 * 8),
];

const BACKGROUND_ENERGY = [DATA_POINT_COUNT];

const BACKGROUND_TRAILER = [field('Number of trigger data points', 2 * 8)];

const BACKGROUND_POINT = [field('Compressed background', COMPRESSED_OCTET)];

const BACKGROUND_SAMPLE = [field('Compressed trigger', COMPRESSED_OCTET)];

export function background({ energies, samples }: ParametersOf<'energies' | 'samples'>): SizeResult {
  return {
    fixedBits:
      sumBits(BACKGROUND_HEADER) + energies * sumBits(BACKGROUND_ENERGY) + sumBits(BACKGROUND_TRAILER),
    variableBits: energies * samples * sumBits(BACKGROUND_POINT) + samples * sumBits(BACKGROUND_SAMPLE),
  };
}

// ---- Variance ----

const VARIANCE_HEADER = [
  ...QL_TIME_HEADER,
  field('Samples per variance', 1 * 8),
  field('Detector mask', 4 * 8),
  field('Energy mask', 4 * 8),
  field('Spare', 4),
  field('Pixel mask', 12),
  field('Spare', 1),
  ...compressionSchema('Variance'),
  DATA_POINT_COUNT,
];

const VARIANCE_SAMPLE = [field('Variance data point', COMPRESSED_OCTET)];

export function variance({ samples }: ParametersOf<'samples'>): SizeResult {
  return {
    fixedBits: sumBits(VARIANCE_HEADER),
    variableBits: samples * sumBits(VARIANCE_SAMPLE),
  };
}

// ---- Spectra ----

export const SPECTRUM_CHANNELS = 32;

const SPECTRA_HEADER = [
  ...QL_TIME_HEADER,
  field('Spare', 1),
  ...compressionSchema('Spectra'),
  field('Spare', 1),
  ...compressionSchema('Trigger'),
  field('Spare', 4),
  field('Pixel mask', 12),
  field('Number of data samples', 2 * 8),
];

const SPECTRA_SAMPLE = [
  field('Detector index', 1 * 8),
  field(`Spectrum (${SPECTRUM_CHANNELS} channels)`, SPECTRUM_CHANNELS * COMPRESSED_OCTET),
  field('Trigger', 1 * 8),
  field('Number of integrations', 1 * 8),
];

export function spectra({ samples }: ParametersOf<'samples'>): SizeResult {
  return {
    fixedBits: sumBits(SPECTRA_HEADER),
    variableBits: samples * sumBits(SPECTRA_SAMPLE),
  };
}

// ---- Flare flag and location ----

const FLARE_FLAG_HEADER = [...QL_TIME_HEADER, field('Number of data samples', 2 * 8)];

const FLARE_FLAG_SAMPLE = [
  field('Flare flag', 1 * 8),
  field('Flare location z (arcmin)', 1 * 8),
  field('Flare location y (arcmin)', 1 * 8),
];

export function flareFlagLocation({ samples }: ParametersOf<'samples'>): SizeResult {
  return {
    fixedBits: sumBits(FLARE_FLAG_HEADER),
    variableBits: samples * sumBits(FLARE_FLAG_SAMPLE),
  };
}

// ---- Flare list and TM management status ----

const FLARE_LIST_HEADER = [
  field('SSID', 1 * 8),
  field('UBSD counter', 4 * 8),
  field('PALD counter', 4 * 8),
  field('Number of flares', 2 * 8),
];

const FLARE_LIST_FLARE = [
  field('Start time', 4 * 8),
  field('End time', 4 * 8),
  field('Highest flare flag', 1 * 8),
  field('TM byte volume', 4 * 8),
  field('Average z location', 1 * 8),
  field('Average y location', 1 * 8),
  field('Processing status', 1 * 8),
];

/** `samples` counts flares in the list. */
export function flareListTmManagement({ samples }: ParametersOf<'samples'>): SizeResult {
  return {
    fixedBits: sumBits(FLARE_LIST_HEADER),
    variableBits: samples * sumBits(FLARE_LIST_FLARE),
  };
}

// ---- Energy calibration spectra ----

export const CALIBRATION_SUB_SPECTRA = 8;

const CALIBRATION_HEADER = [
  field('SSID', 1 * 8),
  field('SCET coarse time', 4 * 8),
  field('Duration', 4 * 8),
  field('Quiet time', 2 * 8),
  field('Live time', 4 * 8),
  field('Average temperature', 2 * 8),
  field('Spare', 1),
  ...compressionSchema('Accumulator'),
  field('Detector mask', 4 * 8),
  field('Spare', 4),
  field('Pixel mask', 12),
  field('Sub spectrum mask', 1 * 8),
  field('Spare', 2),
];

const CALIBRATION_SUB_SPECTRUM = [
  field('Spare', 2),
  field('Number of spectral points', 10),
  field('Number of summed channels per spectral point', 10),
  field('Lowest channel in sub spectrum', 10),
];

const CALIBRATION_TRAILER = [field('Number of structures in packet', 2 * 8)];

const CALIBRATION_SAMPLE = [
  field('Spare', 4),
  field('Detector ID', 5),
  field('Pixel ID', 4),
  field('Sub spectrum ID', 3),
  field('Number of compressed spectral points', 16),
];

const CALIBRATION_POINT = [field('Compressed spectral point', COMPRESSED_OCTET)];

export function calibrationSpectra({ energies, samples }: ParametersOf<'energies' | 'samples'>): SizeResult {
  return {
    fixedBits:
      sumBits(CALIBRATION_HEADER) +
      CALIBRATION_SUB_SPECTRA * sumBits(CALIBRATION_SUB_SPECTRUM) +
      sumBits(CALIBRATION_TRAILER),
    variableBits:
      samples * sumBits(CALIBRATION_SAMPLE) + samples * energies * sumBits(CALIBRATION_POINT),
  };
}

// ---- Definitions ----

export const LIGHT_CURVE: ProductDefinition<'energies' | 'samples'> = {
  id: 'ql-light-curve',
  name: 'QL light curve',
  family: 'quicklook',
  parameters: ['energies', 'samples'],
  recordParameter: 'samples',
  size: lightCurve,
  layout: {
    fixed: [
      section('Header', LIGHT_CURVE_HEADER),
      section('Energy', LIGHT_CURVE_ENERGY, ['energies']),
      section('Header (continued)', LIGHT_CURVE_TRAILER),
    ],
    variable: [
      section('Light curve point', LIGHT_CURVE_POINT, ['energies', 'samples']),
      section('Sample', LIGHT_CURVE_SAMPLE, ['samples']),
    ],
  },
};

export const BACKGROUND: ProductDefinition<'energies' | 'samples'> = {
  id: 'ql-background',
  name: 'QL background',
  family: 'quicklook',
  parameters: ['energies', 'samples'],
  recordParameter: 'samples',
  size: background,
  layout: {
    fixed: [
      section('Header', BACKGROUND_HEADER),
      section('Energy', BACKGROUND_ENERGY, ['energies']),
      section('Header (continued)', BACKGROUND_TRAILER),
    ],
    variable: [
      section('Background point', BACKGROUND_POINT, ['energies', 'samples']),
      section('Sample', BACKGROUND_SAMPLE, ['samples']),
    ],
  },
};

export const VARIANCE: ProductDefinition<'samples'> = {
  id: 'ql-variance',
  name: 'QL variance',
  family: 'quicklook',
  parameters: ['samples'],
  recordParameter: 'samples',
  size: variance,
  layout: {
    fixed: [section('Header', VARIANCE_HEADER)],
    variable: [section('Sample', VARIANCE_SAMPLE, ['samples'])],
  },
};

export const SPECTRA: ProductDefinition<'samples'> = {
  id: 'ql-spectra',
  name: 'QL spectra',
  family: 'quicklook',
  parameters: ['samples'],
  recordParameter: 'samples',
  size: spectra,
  layout: {
    fixed: [section('Header', SPECTRA_HEADER)],
    variable: [section('Sample', SPECTRA_SAMPLE, ['samples'])],
  },
};

export const FLARE_FLAG_LOCATION: ProductDefinition<'samples'> = {
  id: 'ql-flare-flag-location',
  name: 'QL flare flag and location',
  family: 'quicklook',
  parameters: ['samples'],
  recordParameter: 'samples',
  size: flareFlagLocation,
  layout: {
    fixed: [section('Header', FLARE_FLAG_HEADER)],
    variable: [section('Sample', FLARE_FLAG_SAMPLE, ['samples'])],
  },
};

export const FLARE_LIST: ProductDefinition<'samples'> = {
  id: 'ql-flare-list',
  name: 'QL flare list and TM management',
  family: 'quicklook',
  parameters: ['samples'],
  recordParameter: 'samples',
  size: flareListTmManagement,
  layout: {
    fixed: [section('Header', FLARE_LIST_HEADER)],
    variable: [section('Flare', FLARE_LIST_FLARE, ['samples'])],
  },
};

export const CALIBRATION_SPECTRA: ProductDefinition<'energies' | 'samples'> = {
  id: 'ql-calibration-spectra',
  name: 'QL energy calibration spectra',
  family: 'quicklook',
  parameters: ['energies', 'samples'],
  recordParameter: 'samples',
  size: calibrationSpectra,
  layout: {
    fixed: [
      section('Header', CALIBRATION_HEADER),
      section(
        `Sub spectrum (${CALIBRATION_SUB_SPECTRA}x)`,
        repeatFields(CALIBRATION_SUB_SPECTRUM, CALIBRATION_SUB_SPECTRA)
      ),
      section('Header (continued)', CALIBRATION_TRAILER),
    ],
    variable: [
      section('Structure', CALIBRATION_SAMPLE, ['samples']),
      section('Spectral point', CALIBRATION_POINT, ['samples', 'energies']),
    ],
  },
};

import { describe, it, expect } from 'vitest';
import {
  background,
  calibrationSpectra,
  flareFlagLocation,
  flareListTmManagement,
  lightCurve,
  spectra,
  variance,
} from './quicklook';

describe('lightCurve', () => {
  it('sizes the nominal 5 energy configuration', () => {
    expect(lightCurve({ energies: 5, samples: 1 })).toEqual({ fixedBits: 288, variableBits: 56 });
  });

  it('adds a 16 bit data point count per energy to the header', () => {
    expect(lightCurve({ energies: 0, samples: 1 }).fixedBits).toBe(208);
    expect(lightCurve({ energies: 1, samples: 1 }).fixedBits).toBe(224);
  });

  it('costs one octet per energy plus trigger and RCR octets per sample', () => {
    expect(lightCurve({ energies: 5, samples: 10 }).variableBits).toBe(560);
    expect(lightCurve({ energies: 0, samples: 1 }).variableBits).toBe(16);
  });
});

describe('background', () => {
  it('sizes the nominal 5 energy configuration', () => {
    expect(background({ energies: 5, samples: 1 })).toEqual({ fixedBits: 224, variableBits: 48 });
  });

  it('counts the spare bit as a whole bit', () => {
    expect(Number.isInteger(background({ energies: 3, samples: 2 }).fixedBits)).toBe(true);
  });
});

describe('variance', () => {
  it('has a 184 bit header and one octet per sample', () => {
    expect(variance({ samples: 1 })).toEqual({ fixedBits: 184, variableBits: 8 });
    expect(variance({ samples: 16 }).variableBits).toBe(128);
  });
});

describe('spectra', () => {
  it('carries a fixed 32 channel spectrum per sample', () => {
    expect(spectra({ samples: 1 })).toEqual({ fixedBits: 120, variableBits: 280 });
  });
});

describe('flareFlagLocation', () => {
  it('costs a flag and two coordinates per sample', () => {
    expect(flareFlagLocation({ samples: 1 })).toEqual({ fixedBits: 88, variableBits: 24 });
  });
});

describe('flareListTmManagement', () => {
  it('costs 128 bits per listed flare', () => {
    expect(flareListTmManagement({ samples: 1 })).toEqual({ fixedBits: 88, variableBits: 128 });
    expect(flareListTmManagement({ samples: 0 }).variableBits).toBe(0);
  });
});

describe('calibrationSpectra', () => {
  it('includes eight sub spectrum descriptors in the header', () => {
    expect(calibrationSpectra({ energies: 64, samples: 1 }).fixedBits).toBe(474);
  });

  it('costs a 32 bit descriptor plus one octet per spectral point', () => {
    expect(calibrationSpectra({ energies: 64, samples: 1 }).variableBits).toBe(544);
    expect(calibrationSpectra({ energies: 0, samples: 2 }).variableBits).toBe(64);
  });
});

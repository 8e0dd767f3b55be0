/**
 * Packet packing and daily telemetry rate projection.
 *
 * Given a product's fixed header and per-record size, determines how many
 * records fit into one packet payload and what one day of records at a
 * given integration cadence costs in packets and bits.
 */
import type {
  CatalogEntry,
  PacketEnvelope,
  PackingOutcome,
  ProductId,
  RateProjection,
  StructuralParameters,
} from '@shared/types/telemetry.types';
import { PACKET_ENVELOPE, SECONDS_PER_DAY } from '@shared/constants';
import { getProduct } from '../sizing/ProductCatalog';
import {
  DegenerateRecordSizeError,
  FixedOverheadOverflowError,
  NonDivisibleCadenceError,
} from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Number of records produced per day at the given cadence.
 * The cadence must tile the day exactly; fractional periods such as
 * 56.25 s are accepted when they do.
 */
export function recordsPerDay(integrationPeriodS: number): number {
  if (!Number.isFinite(integrationPeriodS) || integrationPeriodS <= 0) {
    throw new NonDivisibleCadenceError(integrationPeriodS);
  }
  const records = SECONDS_PER_DAY / integrationPeriodS;
  if (!Number.isInteger(records)) {
    throw new NonDivisibleCadenceError(integrationPeriodS);
  }
  return records;
}

/**
 * Pack whole records into the payload left after the fixed header.
 *
 * Invariant: recordsPerPacket * variableBits + remainderBits === availableBits,
 * with 0 <= remainderBits < variableBits.
 */
export function packRecords(
  fixedBits: number,
  variableBits: number,
  capacityBits: number
): PackingOutcome {
  const availableBits = capacityBits - fixedBits;
  if (availableBits <= 0) {
    throw new FixedOverheadOverflowError(fixedBits, capacityBits);
  }

  if (!Number.isFinite(variableBits) || variableBits <= 0) {
    throw new DegenerateRecordSizeError(
      `Record size must be positive, got ${variableBits} bits`,
      variableBits,
      availableBits
    );
  }

  const recordsPerPacket = Math.floor(availableBits / variableBits);
  const remainderBits = availableBits % variableBits;

  if (recordsPerPacket === 0) {
    throw new DegenerateRecordSizeError(
      `Record of ${variableBits} bits does not fit in ${availableBits} available bits`,
      variableBits,
      availableBits
    );
  }

  return {
    capacityBits,
    fixedBits,
    availableBits,
    variableBits,
    recordsPerPacket,
    remainderBits,
  };
}

/**
 * Project a day of telemetry from an already computed size pair.
 */
export function projectRate(
  product: ProductId,
  fixedBits: number,
  variableBits: number,
  integrationPeriodS: number,
  envelope: PacketEnvelope = PACKET_ENVELOPE
): RateProjection {
  const perDay = recordsPerDay(integrationPeriodS);
  const packing = packRecords(fixedBits, variableBits, envelope.maxPayloadBits);

  // Average rate: not rounded up to whole packets
  const packetsPerDay = perDay / packing.recordsPerPacket;
  const totalBitsPerDay =
    packetsPerDay * (packing.fixedBits + packing.recordsPerPacket * packing.variableBits);

  return {
    ...packing,
    product,
    integrationPeriodS,
    recordsPerDay: perDay,
    packetsPerDay,
    totalBitsPerDay,
    bitsPerSecond: totalBitsPerDay / SECONDS_PER_DAY,
    envelopeBitsPerDay: packetsPerDay * (envelope.headerBits + envelope.dataHeaderBits),
  };
}

/**
 * Size one record of a product and project its daily telemetry volume.
 *
 * The product's record parameter (samples, or energy groups for X-ray
 * levels 1-3) is set to 1; every other parameter it reads must be given.
 * Accepts a catalog id or a definition with its own size function.
 */
export function estimateRate(
  productOrId: string | CatalogEntry,
  parameters: Partial<StructuralParameters>,
  integrationPeriodS: number,
  envelope: PacketEnvelope = PACKET_ENVELOPE
): RateProjection {
  const product = typeof productOrId === 'string' ? getProduct(productOrId) : productOrId;
  const { fixedBits, variableBits } = product.size({
    ...parameters,
    [product.recordParameter]: 1,
  });

  const projection = projectRate(product.id, fixedBits, variableBits, integrationPeriodS, envelope);

  logger.debug(
    `${product.id}: ${projection.recordsPerPacket} records/packet, ` +
      `${projection.packetsPerDay.toFixed(3)} packets/day, ${projection.bitsPerSecond.toFixed(3)} bit/s`
  );

  return projection;
}

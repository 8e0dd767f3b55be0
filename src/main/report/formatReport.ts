import type {
  BudgetReport,
  CatalogEntry,
  LayoutSection,
  RateProjection,
  SizeResult,
} from '@shared/types/telemetry.types';
import { sumBits } from '../sizing/fields';
import type { LayoutDescription } from '../sizing/ProductCatalog';

const RATE_DIGITS = 3;

export function formatProjectionLine(label: string, projection: RateProjection): string {
  return (
    `${label} (${projection.product}): packet ${projection.capacityBits} bits, ` +
    `fixed ${projection.fixedBits}, remaining ${projection.availableBits}, ` +
    `record ${projection.variableBits}, records/packet ${projection.recordsPerPacket}, ` +
    `free ${projection.remainderBits}, ` +
    `packets/day ${projection.packetsPerDay.toFixed(RATE_DIGITS)}, ` +
    `${projection.bitsPerSecond.toFixed(RATE_DIGITS)} bit/s`
  );
}

export function formatBudgetReport(report: BudgetReport): string {
  const lines = [
    `Downlink budget ${report.id} (${report.generatedAt})`,
    `Packet envelope: header ${report.envelope.headerBits}, ` +
      `data header ${report.envelope.dataHeaderBits}, payload ${report.envelope.maxPayloadBits} bits`,
  ];

  for (const entry of report.entries) {
    if (entry.status === 'ok') {
      lines.push(formatProjectionLine(entry.label, entry.projection));
    } else {
      lines.push(`FAILED ${entry.label} (${entry.product}): [${entry.error.code}] ${entry.error.message}`);
    }
  }

  lines.push(
    `Total: ${report.totalBitsPerSecond.toFixed(RATE_DIGITS)} bit/s ` +
      `(${Math.round(report.totalBitsPerDay)} bits/day)`
  );
  if (report.failures > 0) {
    lines.push(`${report.failures} product(s) excluded from the total`);
  }

  return lines.join('\n');
}

export function formatSizeResult(id: string, result: SizeResult): string {
  return `${id}: fixed ${result.fixedBits} bits, variable ${result.variableBits} bits`;
}

export function formatCatalog(products: readonly CatalogEntry[]): string {
  const idWidth = Math.max(...products.map((p) => p.id.length));
  return products
    .map(
      (p) =>
        `${p.id.padEnd(idWidth)}  ${p.family.padEnd(9)}  ${p.name} ` +
        `[${p.parameters.join(', ')}; record: ${p.recordParameter}]`
    )
    .join('\n');
}

function formatSection(sec: LayoutSection): string[] {
  const repeat = sec.repeat.length > 0 ? ` x ${sec.repeat.join(' x ')}` : '';
  const lines = [`  ${sec.name}${repeat} (${sumBits(sec.fields)} bits)`];
  for (const f of sec.fields) {
    lines.push(`    ${f.name.padEnd(48)} ${String(f.bits).padStart(4)}`);
  }
  return lines;
}

export function formatLayout({ product, layout, totals }: LayoutDescription): string {
  const lines = [
    `${product.name} (${product.id}), ${product.family}`,
    `Parameters: ${product.parameters.join(', ')} (record: ${product.recordParameter})`,
  ];
  if (product.commonHeaderBits !== undefined) {
    lines.push(`Common user-request header: ${product.commonHeaderBits} bits (not included below)`);
  }

  lines.push('Fixed:');
  layout.fixed.forEach((sec) => lines.push(...formatSection(sec)));
  lines.push('Variable:');
  layout.variable.forEach((sec) => lines.push(...formatSection(sec)));
  lines.push(`Totals: fixed ${totals.fixedBits} bits, variable ${totals.variableBits} bits`);

  return lines.join('\n');
}

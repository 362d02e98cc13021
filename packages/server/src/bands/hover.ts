import type { BandEntry, BandLookup, BandTable } from '@sweepscope/shared';
import { formatFrequency } from '../spectrum/format.js';
import { lookupBand } from './table.js';

/** HTML snippet for a chart tooltip; empty when there is no band. */
export function formatBandHover(info: BandEntry | undefined): string {
  if (!info) return '';
  const parts = [
    `📡 ${info.primaryService}`,
    `${formatFrequency(info.startHz)} – ${formatFrequency(info.endHz)}`,
  ];
  if (info.usage && info.usage !== info.primaryService) {
    parts.push(`Usage: ${info.usage}`);
  }
  return parts.join('<br>');
}

export function bandLookup(table: BandTable): BandLookup {
  return (freqHz) => lookupBand(freqHz, table);
}

export function annotateHover(freqHz: number, baseText: string, lookup?: BandLookup): string {
  if (!lookup) return baseText;
  const annotation = formatBandHover(lookup(freqHz));
  return annotation ? `${baseText}<br>───<br>${annotation}` : baseText;
}

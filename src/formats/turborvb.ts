/**
 * TurboRVB pseudopotential writer.
 *
 *   ECP
 *     1   3.39   2
 *     1   1
 *     1.00000000000000   2     1.00000000000000
 *     ...
 *
 * The cutoff radius r0 is found by sampling every channel on a fixed grid.
 */

import { validationError } from '../shared/index.js';
import { ecpTerms, toDiskOrder } from './ecp.js';
import { formatFloat, formatInt, renderToString, type FloatFormat, type TextSink } from './output.js';
import type { EcpFunction, EcpPseudopotentialRecord } from './records.js';
import { validateEcpPseudopotential } from './schemas.js';

export const DEFAULT_CUTOFF_TOLERANCE = 1e-5;

const GRID_STEP = 0.01;
const GRID_POINTS = 1000;
const TERM_FORMAT: FloatFormat = { width: 22, precision: 14 };

export interface TurborvbWriteOptions {
  /** |V(r)| must exceed this for r to count as inside the cutoff. */
  tolerance?: number;
  /** Used when no grid point exceeds the tolerance. */
  fallbackCutoff?: number;
  /** Atom index on the header line. */
  index?: number;
}

/** V(r) = (1/r²) Σ prefactor · r^polynom · exp(-exponent · r²) */
export function evaluateChannel(fn: EcpFunction, r: number): number {
  let sum = 0;
  for (const term of ecpTerms(fn)) {
    sum += term.prefactor * r ** term.polynom * Math.exp(-term.exponent * r * r);
  }
  return sum / (r * r);
}

/** Largest grid radius with |V(r)| > tolerance, or undefined when there is none. */
export function channelCutoff(fn: EcpFunction, tolerance = DEFAULT_CUTOFF_TOLERANCE): number | undefined {
  let cutoff: number | undefined;
  for (let i = 0; i < GRID_POINTS; i++) {
    const r = GRID_STEP * i;
    // r = 0 can give NaN, which never compares greater
    if (Math.abs(evaluateChannel(fn, r)) > tolerance) cutoff = r;
  }
  return cutoff;
}

export function cutoffRadius(record: EcpPseudopotentialRecord, options: TurborvbWriteOptions = {}): number {
  let r0: number | undefined;
  for (const fn of record.functions) {
    const cutoff = channelCutoff(fn, options.tolerance);
    if (cutoff !== undefined && (r0 === undefined || cutoff > r0)) r0 = cutoff;
  }

  r0 ??= options.fallbackCutoff;
  if (r0 === undefined) {
    throw validationError(
      `${record.element} ${record.name}: no grid point exceeds the tolerance and no fallback cutoff was given`,
      { format: 'TurboRVB', element: record.element, name: record.name },
    );
  }
  return r0;
}

export function writeTurborvbEcp(sink: TextSink, record: EcpPseudopotentialRecord, options: TurborvbWriteOptions = {}): void {
  const ecp = validateEcpPseudopotential(record);
  const r0 = cutoffRadius(ecp, options);
  const channels = toDiskOrder(ecp.functions);

  sink.write('ECP\n');
  sink.write(`${formatInt(options.index ?? 1, 4)}${r0.toFixed(2).padStart(7)}${formatInt(channels.length, 4)}\n`);
  sink.write(channels.map(fn => formatInt(fn.prefactors.length, 4)).join('') + '\n');
  for (const fn of channels) {
    for (const term of ecpTerms(fn)) {
      sink.write(
        `${formatFloat(term.prefactor, TERM_FORMAT)} ${formatInt(term.polynom, 3)} ${formatFloat(term.exponent, TERM_FORMAT)}\n`,
      );
    }
  }
}

export function formatTurborvbPseudopotential(record: EcpPseudopotentialRecord, options: TurborvbWriteOptions = {}): string {
  return renderToString(sink => writeTurborvbEcp(sink, record, options));
}

/**
 * Helpers shared by the ECP codecs (GAMESS, Gaussian, NWChem, TurboRVB).
 *
 * On disk the local ("ul") channel comes first: [ul, l=0, ..., l=lmax-1].
 * In memory it comes last: [l=0, ..., l=lmax-1, ul].
 */

import { atomicNumber } from './elements.js';
import type { EcpFunction, EcpPseudopotentialRecord } from './records.js';
import { shellLetter } from './records.js';

export function fromDiskOrder<T>(channels: readonly T[]): T[] {
  const [local, ...rest] = channels;
  return local === undefined ? [] : [...rest, local];
}

export function toDiskOrder<T>(functions: readonly T[]): T[] {
  const local = functions[functions.length - 1];
  return local === undefined ? [] : [local, ...functions.slice(0, -1)];
}

export function emptyEcpFunction(): EcpFunction {
  return { prefactors: [], polynoms: [], exponents: [] };
}

export function addTerm(fn: EcpFunction, prefactor: number, polynom: number, exponent: number): void {
  fn.prefactors.push(prefactor);
  // powers of r are integers even when a file writes them as "2.0"
  fn.polynoms.push(Math.trunc(polynom));
  fn.exponents.push(exponent);
}

export function* ecpTerms(fn: EcpFunction): Generator<{ prefactor: number; polynom: number; exponent: number }> {
  for (let i = 0; i < fn.prefactors.length; i++) {
    yield {
      prefactor: fn.prefactors[i] ?? 0,
      polynom: fn.polynoms[i] ?? 0,
      exponent: fn.exponents[i] ?? 0,
    };
  }
}

export interface EcpRecordInput {
  element: string;
  name: string;
  aliases?: string[];
  core_electrons: number;
  /** canonical order, local channel last */
  functions: EcpFunction[];
}

export function makeEcpRecord(input: EcpRecordInput): EcpPseudopotentialRecord {
  const Z = atomicNumber(input.element);
  return {
    kind: 'ecp',
    element: input.element,
    name: input.name,
    aliases: input.aliases ?? [input.name],
    tags: input.name.split('-'),
    version: 1,
    core_electrons: input.core_electrons,
    lmax: input.functions.length - 1,
    n_el_tot: Z === undefined ? null : Z - input.core_electrons,
    functions: input.functions,
  };
}

/** Label of on-disk channel i: "ul" for the local channel, then "s-ul", "p-ul", ... */
export function diskChannelLabel(i: number): string {
  return i === 0 ? 'ul' : `${shellLetter(i - 1)}-ul`;
}

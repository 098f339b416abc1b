/**
 * Canonical in-memory records exchanged with the persistence layer.
 *
 * Field names follow the stored attribute names (snake_case), so a record
 * serialises to the same JSON the caller keeps.
 */

/** (angular momentum l, number of contracted shells for that l) */
export type AngularMomentumEntry = [l: number, shellCount: number];

export interface BasisSetBlock {
  /** principal quantum number */
  n: number;
  l: AngularMomentumEntry[];
  /** rows of [exponent, coefficient per shell...], shells in the order of `l` */
  coefficients: number[][];
}

export interface BasisSetRecord {
  element: string;
  name: string;
  aliases: string[];
  tags: string[];
  n_el: number | null;
  version: number;
  blocks: BasisSetBlock[];
}

export interface GthLocalPart {
  r: number;
  coeffs: number[];
}

export interface GthProjector {
  r: number;
  nproj: number;
  /** upper triangle of the symmetric nproj x nproj matrix, row by row */
  coeffs: number[];
}

export interface GthNlccTerm {
  r: number;
  coeffs: number[];
}

export interface GthPseudopotentialRecord {
  kind: 'gth';
  element: string;
  name: string;
  aliases: string[];
  tags: string[];
  version: number;
  /** electrons per angular momentum channel (s, p, d, ...) */
  n_el: number[];
  local: GthLocalPart;
  non_local: GthProjector[];
  nlcc: GthNlccTerm[];
}

/** Sum of prefactor * r^polynom * exp(-exponent * r^2), divided by r^2. */
export interface EcpFunction {
  prefactors: number[];
  polynoms: number[];
  exponents: number[];
}

export interface EcpPseudopotentialRecord {
  kind: 'ecp';
  element: string;
  name: string;
  aliases: string[];
  tags: string[];
  version: number;
  core_electrons: number;
  lmax: number;
  n_el_tot: number | null;
  /** [l=0, ..., l=lmax-1, local] */
  functions: EcpFunction[];
}

export type PseudopotentialRecord = GthPseudopotentialRecord | EcpPseudopotentialRecord;

export type PseudopotentialKind = PseudopotentialRecord['kind'];

export const SHELL_LETTERS = ['s', 'p', 'd', 'f', 'g', 'h', 'i'] as const;

export function shellLetter(l: number): string {
  const letter = SHELL_LETTERS[l];
  if (letter === undefined) throw new RangeError(`No shell letter for angular momentum ${l}`);
  return letter;
}

export function angularMomentumOf(letter: string): number | undefined {
  const lower = letter.toLowerCase();
  const index = SHELL_LETTERS.findIndex(candidate => candidate === lower);
  return index >= 0 ? index : undefined;
}

export function triangularCount(nproj: number): number {
  return (nproj * (nproj + 1)) / 2;
}

/** Offset of row i of the packed upper triangle; the row has nproj - i entries. */
export function triangularRowOffset(i: number, nproj: number): number {
  return i * nproj - (i * (i - 1)) / 2;
}

export function shellColumnCount(block: Pick<BasisSetBlock, 'l'>): number {
  return block.l.reduce((sum, [, count]) => sum + count, 0);
}

// ── Filtering ─────────────────────────────────────────────────────────────

export interface RecordFilter {
  element?: string;
  /** every listed tag must be present */
  tags?: string[];
}

export function matchesFilter(record: { element: string; tags: readonly string[] }, filter: RecordFilter): boolean {
  if (filter.element !== undefined && record.element !== filter.element) return false;
  if (filter.tags && !filter.tags.every(tag => record.tags.includes(tag))) return false;
  return true;
}

export function* filterRecords<T extends { element: string; tags: readonly string[] }>(
  records: Iterable<T>,
  filter: RecordFilter,
): Generator<T> {
  for (const record of records) {
    if (matchesFilter(record, filter)) yield record;
  }
}

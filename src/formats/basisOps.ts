/**
 * Operations on parsed basis sets that no single file format owns.
 */

import { deriveValenceElectrons } from './lexer.js';
import type { AngularMomentumEntry, BasisSetBlock, BasisSetRecord } from './records.js';
import { shellLetter } from './records.js';
import { validateBasisSet } from './schemas.js';

export const UNCONTRACTED_SUFFIX = '-uncont';

/** Number of spherical orbital functions: sum of (2l + 1) per contracted shell. */
export function countOrbitalFunctions(blocks: readonly BasisSetBlock[]): number {
  let total = 0;
  for (const block of blocks) {
    for (const [l, num] of block.l) total += (2 * l + 1) * num;
  }
  return total;
}

/**
 * One block per primitive: every exponent row becomes its own block with a
 * single shell per angular momentum and contraction coefficient 1.0.
 */
export function uncontractBasisSet(record: BasisSetRecord): BasisSetRecord {
  const source = validateBasisSet(record);
  const name = `${source.name}${UNCONTRACTED_SUFFIX}`;
  const tags = name.split('-');

  const blocks: BasisSetBlock[] = [];
  for (const block of source.blocks) {
    for (const row of block.coefficients) {
      const l = block.l.map(([lqn]): AngularMomentumEntry => [lqn, 1]);
      blocks.push({ n: block.n, l, coefficients: [[row[0] ?? 0, ...l.map(() => 1.0)]] });
    }
  }

  return {
    ...source,
    name,
    aliases: [name],
    tags,
    n_el: source.n_el ?? deriveValenceElectrons(source.element, tags),
    blocks,
  };
}

function sameExponents(a: BasisSetBlock, b: BasisSetBlock): boolean {
  return a.coefficients.length === b.coefficients.length
    && a.coefficients.every((row, i) => row[0] === b.coefficients[i]?.[0]);
}

function mergeInto(a: BasisSetBlock, b: BasisSetBlock): BasisSetBlock | undefined {
  if (a.n !== b.n || !sameExponents(a, b)) return undefined;
  const last = a.l[a.l.length - 1];
  const [first, ...rest] = b.l;
  if (last === undefined || first === undefined) return undefined;

  let l: AngularMomentumEntry[];
  if (first[0] === last[0]) {
    l = [...a.l.slice(0, -1), [last[0], last[1] + first[1]], ...rest];
  } else if (first[0] === last[0] + 1) {
    l = [...a.l, ...b.l];
  } else {
    return undefined;
  }

  const coefficients = a.coefficients.map((row, i) => [...row, ...(b.coefficients[i] ?? []).slice(1)]);
  return { n: a.n, l, coefficients };
}

/**
 * Merges consecutive blocks that share n and the exponent column when the
 * second one continues the first one's angular momenta.
 */
export function mergeBlocks(blocks: readonly BasisSetBlock[]): BasisSetBlock[] {
  const merged: BasisSetBlock[] = [];
  for (const block of blocks) {
    const previous = merged[merged.length - 1];
    const combined = previous && mergeInto(previous, block);
    if (combined) merged[merged.length - 1] = combined;
    else merged.push({ n: block.n, l: block.l.map(([l, num]): AngularMomentumEntry => [l, num]), coefficients: block.coefficients.map(row => [...row]) });
  }
  return merged;
}

export interface ShellSection {
  /** Upper-case shell label: S, P, D, ... or SP. */
  label: string;
  /** Rows of [exponent, coefficient...]. */
  rows: number[][];
}

function isSpBlock(block: BasisSetBlock): boolean {
  const [s, p, extra] = block.l;
  return extra === undefined && s?.[0] === 0 && s[1] === 1 && p?.[0] === 1 && p[1] === 1;
}

/**
 * Splits a block into single-contraction shells for the formats that list one
 * shell per header. With `combineSp`, an s+p block with one shell each stays a
 * single SP section.
 */
export function expandShells(block: BasisSetBlock, combineSp = false): ShellSection[] {
  if (combineSp && isSpBlock(block)) {
    return [{ label: 'SP', rows: block.coefficients.map(row => [...row]) }];
  }

  const sections: ShellSection[] = [];
  let column = 1;
  for (const [l, num] of block.l) {
    for (let repeat = 0; repeat < num; repeat++) {
      const index = column;
      sections.push({
        label: shellLetter(l).toUpperCase(),
        rows: block.coefficients.map(row => [row[0] ?? 0, row[index] ?? 0]),
      });
      column += 1;
    }
  }
  return sections;
}

/**
 * Contracted shells per angular momentum across all blocks, e.g. "2s1p"
 * for a DZVP hydrogen set.
 */
export function shellSummary(blocks: readonly BasisSetBlock[]): string {
  const counts = new Map<number, number>();
  for (const block of blocks) {
    for (const [l, num] of block.l) counts.set(l, (counts.get(l) ?? 0) + num);
  }
  return [...counts]
    .sort(([a], [b]) => a - b)
    .map(([l, num]) => `${num}${shellLetter(l)}`)
    .join('');
}

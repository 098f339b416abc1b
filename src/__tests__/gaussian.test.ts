import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { parseGamessPseudopotentials } from '../formats/gamess.js';
import {
  formatGaussianBasisSets,
  formatGaussianPseudopotentials,
  parseGaussianBasisSets,
  parseGaussianPseudopotentials,
} from '../formats/gaussian.js';
import { expectCodecError } from './expectCodecError.js';

const GAMESS_ECP = fs.readFileSync(
  fileURLToPath(new URL('../../tests/fixtures/NA.ecp.gamess', import.meta.url)),
  'utf-8',
);

const BASIS_TEXT = [
  '! invented test basis',
  'H     0',
  'S   2   1.00',
  '      5.0   0.3',
  '      1.0   0.7',
  'P   1   1.00',
  '      0.8   1.0',
  '****',
  'C     0',
  'SP   1   1.00',
  '      3.0   0.4   0.5',
  '****',
].join('\n');

const BASIS_WRITTEN =
  'H     0\nS   2   1.00\n        5.0000000000        0.3000000000\n        1.0000000000        0.7000000000\n'
  + 'P   1   1.00\n        0.8000000000        1.0000000000\n****\n'
  + 'C     0\nSP   1   1.00\n        3.0000000000        0.4000000000        0.5000000000\n****\n';

const ECP_WRITTEN = [
  'Na     0',
  'NA-ECP     2     10',
  'ul potential',
  '  1',
  '1        2.0000000000       -1.5000000000',
  's-ul potential',
  '  2',
  '0        4.0000000000        3.0000000000',
  '2        1.2500000000       12.5000000000',
  'p-ul potential',
  '  1',
  '0        3.5000000000        2.2500000000',
  '',
].join('\n');

describe('Gaussian94 basis sets', () => {
  it('reads element sections terminated by ****', () => {
    const records = parseGaussianBasisSets(BASIS_TEXT, { name: 'test-DZ' });
    expect(records.map(r => r.element)).toEqual(['H', 'C']);
    expect(records[0]!.blocks).toEqual([
      { n: 1, l: [[0, 1]], coefficients: [[5, 0.3], [1, 0.7]] },
      { n: 2, l: [[1, 1]], coefficients: [[0.8, 1]] },
    ]);
    expect(records[1]!.blocks).toEqual([{ n: 1, l: [[0, 1], [1, 1]], coefficients: [[3, 0.4, 0.5]] }]);
  });

  it('skips a terminator line before the first element', () => {
    const records = parseGaussianBasisSets('****\nH     0\nS   1   1.00\n  1.0  1.0\n****\n');
    expect(records).toEqual([{
      element: 'H',
      name: 'gaussian',
      aliases: ['gaussian'],
      tags: ['gaussian'],
      n_el: null,
      version: 1,
      blocks: [{ n: 1, l: [[0, 1]], coefficients: [[1, 1]] }],
    }]);
  });

  it('gives each record its own tags', () => {
    const [hydrogen, carbon] = parseGaussianBasisSets(BASIS_TEXT, { name: 'test-DZ' });
    hydrogen!.tags.push('extra');
    expect(carbon!.tags).toEqual(['test', 'DZ']);
  });

  it('accepts Fortran exponents and applies the scale factor', () => {
    const [record] = parseGaussianBasisSets('H 0\nS 1 2.00\n 0.15D+01 1.0D+00\n****\n');
    expect(record?.blocks[0]?.coefficients).toEqual([[6, 1]]);
  });

  it('writes SP shells and terminators', () => {
    const records = parseGaussianBasisSets(BASIS_TEXT, { name: 'test-DZ' });
    expect(formatGaussianBasisSets(records)).toBe(BASIS_WRITTEN);
  });

  it('rejects an element without terminator', () => {
    expectCodecError(
      () => parseGaussianBasisSets('H 0\nS 1 1.00\n 1.0 1.0\n'),
      'PARSE_ERROR',
      /H is not terminated by "\*\*\*\*"/,
    );
  });

  it('rejects a header that is not "<element> 0"', () => {
    expectCodecError(() => parseGaussianBasisSets('H 1\n****\n'), 'PARSE_ERROR', /expected "<element> 0", got "H 1"/);
  });
});

describe('Gaussian ECPs', () => {
  it('writes channel labels, counts and "polynom exponent prefactor" terms', () => {
    const records = parseGamessPseudopotentials(GAMESS_ECP);
    expect(formatGaussianPseudopotentials(records)).toBe(ECP_WRITTEN);
  });

  it('reads what it writes', () => {
    const records = parseGamessPseudopotentials(GAMESS_ECP);
    expect(parseGaussianPseudopotentials(ECP_WRITTEN)).toEqual(records);
  });

  it('skips terminator lines between entries', () => {
    const records = parseGaussianPseudopotentials(`${ECP_WRITTEN}****\n${ECP_WRITTEN}`);
    expect(records).toHaveLength(2);
  });

  it('filters by element', () => {
    expect(parseGaussianPseudopotentials(ECP_WRITTEN, { element: 'K' })).toEqual([]);
  });

  it('rejects a term line with the wrong number of fields', () => {
    const text = 'Na 0\nNA-ECP 0 10\nul potential\n  1\n2 1.0\n';
    expectCodecError(
      () => parseGaussianPseudopotentials(text),
      'PARSE_ERROR',
      /Gaussian ECP NA-ECP: expected "polynom exponent prefactor", got "2 1.0" \(line 5\)/,
    );
  });
});

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import {
  cp2kBasisSetIter,
  formatCp2kBasisSets,
  parseCp2kBasisSets,
  parseSingleCp2kBasisSet,
  writeCp2kBasisSet,
} from '../formats/cp2kBasisSet.js';
import { StringSink, type FloatFormat } from '../formats/output.js';
import type { AngularMomentumEntry } from '../formats/records.js';
import { expectCodecError } from './expectCodecError.js';

const FIXTURE = fileURLToPath(new URL('../../tests/fixtures/BASIS_TEST', import.meta.url));
const BASIS_TEXT = fs.readFileSync(FIXTURE, 'utf-8');

const DZVP_LINES = [
  'H DZVP-MOLOPT-GTH DZVP-MOLOPT-GTH-q1',
  ' 1',
  ' 2 0 1 7 2 1',
  '   12.500000000000  0.025000000000 -0.012500000000  0.024500000000',
  '    4.250000000000  0.080000000000 -0.056000000000  0.058100000000',
  '    1.500000000000  0.130000000000  0.011200000000  0.444700000000',
  '    0.750000000000  0.380000000000 -0.418600000000  0.646200000000',
  '    0.250000000000  0.320000000000  0.590400000000  0.803400000000',
  '    0.062500000000  0.037000000000  0.438300000000  0.893000000000',
  '    0.020000000000 -0.001100000000 -0.060000000000  0.120100000000',
];

describe('parseSingleCp2kBasisSet', () => {
  it('derives name, aliases, tags and valence electrons from the header', () => {
    const record = parseSingleCp2kBasisSet(DZVP_LINES);
    expect(record.element).toBe('H');
    expect(record.name).toBe('DZVP-MOLOPT-GTH-q1');
    expect(record.aliases).toEqual(['DZVP-MOLOPT-GTH-q1', 'DZVP-MOLOPT-GTH']);
    expect(record.tags).toEqual(['DZVP', 'MOLOPT', 'GTH', 'q1']);
    expect(record.n_el).toBe(1);
    expect(record.version).toBe(1);
  });

  it('reads the block quantum numbers and coefficient rows', () => {
    const record = parseSingleCp2kBasisSet(DZVP_LINES);
    expect(record.blocks).toHaveLength(1);
    const block = record.blocks[0]!;
    expect(block.n).toBe(2);
    expect(block.l).toEqual([[0, 2], [1, 1]]);
    expect(block.coefficients).toHaveLength(7);
    expect(block.coefficients[0]).toEqual([12.5, 0.025, -0.0125, 0.0245]);
    expect(block.coefficients[6]).toEqual([0.02, -0.0011, -0.06, 0.1201]);
  });

  it('gives null valence electrons for conflicting qN tags', () => {
    const record = parseSingleCp2kBasisSet(['H ODD-q1-q2', '1', '1 0 0 1 1', '1.0 1.0']);
    expect(record.tags).toEqual(['ODD', 'q1', 'q2']);
    expect(record.n_el).toBeNull();
  });

  it('uses the atomic number for all-electron entries', () => {
    const record = parseSingleCp2kBasisSet(['O ALL-TEST', '1', '1 0 0 1 1', '1.0 1.0']);
    expect(record.n_el).toBe(8);
  });

  it('gives null valence electrons without qN or ALL tags', () => {
    const record = parseSingleCp2kBasisSet(['H 6-31G', '1', '1 0 0 1 1', '1.0 1.0']);
    expect(record.n_el).toBeNull();
  });

  it('skips blank and comment lines inside the entry', () => {
    const record = parseSingleCp2kBasisSet(['H SZV-q1', '', '# one set', '1', '1 0 0 1 1', '1.0 1.0']);
    expect(record.blocks[0]!.coefficients).toEqual([[1, 1]]);
  });

  it('rejects a shell count list that does not match lmin..lmax', () => {
    expectCodecError(
      () => parseSingleCp2kBasisSet(['H X-q1', '1', '2 0 1 1 2', '1.0 1.0 1.0']),
      'VALIDATION_ERROR',
      /declares 2 angular momenta but 1 shell counts/,
    );
  });

  it('rejects a row with the wrong number of coefficients', () => {
    expectCodecError(
      () => parseSingleCp2kBasisSet(['H X-q1', '1', '1 0 0 1 2', '1.0 1.0']),
      'VALIDATION_ERROR',
      /row has 2 values, expected 3 \(line 4\)/,
    );
  });

  it('rejects a non-integer set count', () => {
    expectCodecError(
      () => parseSingleCp2kBasisSet(['H X-q1', '1.5', '1 0 0 1 1', '1.0 1.0']),
      'PARSE_ERROR',
      /expected an integer for number of sets, got "1.5"/,
    );
  });

  it('rejects lines after the declared sets', () => {
    expectCodecError(
      () => parseSingleCp2kBasisSet(['H X-q1', '1', '1 0 0 1 1', '1.0 1.0', '2.0 2.0']),
      'PARSE_ERROR',
      /unexpected line after 1 set\(s\)/,
    );
  });

  it('rejects an entry that ends before all rows are read', () => {
    expectCodecError(
      () => parseSingleCp2kBasisSet(['H X-q1', '1', '1 0 0 3 1', '1.0 1.0']),
      'PARSE_ERROR',
      /premature end of input/,
    );
  });
});

describe('parseCp2kBasisSets', () => {
  it('reads every entry of a library file', () => {
    const records = parseCp2kBasisSets(BASIS_TEXT);
    expect(records.map(r => `${r.element} ${r.name}`)).toEqual([
      'H DZVP-MOLOPT-GTH-q1',
      'He SZV-TEST-GTH-q2',
    ]);
    const he = records[1]!;
    expect(he.n_el).toBe(2);
    expect(he.blocks.map(b => [b.n, b.l])).toEqual([[1, [[0, 1]]], [2, [[1, 1]]]]);
  });

  it('filters by element and tags', () => {
    expect(parseCp2kBasisSets(BASIS_TEXT, { element: 'He' }).map(r => r.name)).toEqual(['SZV-TEST-GTH-q2']);
    expect(parseCp2kBasisSets(BASIS_TEXT, { tags: ['MOLOPT'] }).map(r => r.element)).toEqual(['H']);
    expect(parseCp2kBasisSets(BASIS_TEXT, { element: 'He', tags: ['MOLOPT'] })).toEqual([]);
  });

  it('iterates lazily', () => {
    const iter = cp2kBasisSetIter(BASIS_TEXT);
    expect(iter.next().value?.element).toBe('H');
    expect(iter.next().value?.element).toBe('He');
    expect(iter.next().done).toBe(true);
  });

  it('reports line numbers of the whole file', () => {
    const text = 'H X-q1\n1\n1 0 0 1 1\n1.0 1.0\n\nHe Y-q2\n1\n1 0 0 1 1\n1.0 abc\n';
    expectCodecError(() => parseCp2kBasisSets(text), 'PARSE_ERROR', /CP2K basis set He Y-q2: .*"abc" \(line 9\)/);
  });
});

describe('writeCp2kBasisSet', () => {
  it('reproduces the input lines after the header', () => {
    const record = parseSingleCp2kBasisSet(DZVP_LINES);
    const sink = new StringSink();
    writeCp2kBasisSet(sink, record, { comment: 'test' });
    const out = sink.toString().split('\n');

    expect(out[0]).toBe('# test');
    expect(out[1]).toBe('H DZVP-MOLOPT-GTH-q1');
    expect(out.slice(2, -1).map(line => line.trimStart())).toEqual(DZVP_LINES.slice(1).map(line => line.trim()));
    expect(out[out.length - 1]).toBe('');
  });

  it('writes a block with several shells using caller formats', () => {
    const record = parseSingleCp2kBasisSet(DZVP_LINES);
    const fmt: FloatFormat = { width: 12, precision: 9, sign: 'space' };
    const text = formatCp2kBasisSets([record], { exponentFormat: fmt, coefficientFormat: fmt });
    const lines = text.split('\n');
    expect(lines[3]).toBe('2 0 1 7 2 1');
    expect(lines[4]).toBe(' 12.500000000  0.025000000 -0.012500000  0.024500000');
    expect(lines[5]).toBe(' 4.250000000  0.080000000 -0.056000000  0.058100000');
    expect(lines[10]).toBe(' 0.020000000 -0.001100000 -0.060000000  0.120100000');
  });

  it('writes an empty comment line by default', () => {
    const record = parseSingleCp2kBasisSet(['H X-q1', '1', '1 0 0 1 1', '1.0 1.0']);
    expect(formatCp2kBasisSets([record])).toBe(
      '# \nH X-q1\n1\n1 0 0 1 1\n    1.000000000000  1.000000000000\n',
    );
  });

  it('validates the record before writing', () => {
    const record = parseSingleCp2kBasisSet(['H X-q1', '1', '1 0 0 1 1', '1.0 1.0']);
    const l: AngularMomentumEntry[] = [[0, 2]];
    const broken = { ...record, blocks: [{ n: 1, l, coefficients: [[1, 1]] }] };
    expectCodecError(() => formatCp2kBasisSets([broken]), 'VALIDATION_ERROR', /row has 2 values, expected 3/);
  });
});

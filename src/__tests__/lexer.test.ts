import { describe, it, expect } from 'vitest';
import {
  LineCursor,
  deriveIdentifiers,
  deriveValenceElectrons,
  identifiersFromFilename,
  isBlankOrComment,
  numberedLines,
  parseFloatToken,
  parseIntToken,
  splitCp2kBlocks,
} from '../formats/lexer.js';
import { expectCodecError } from './expectCodecError.js';

describe('numberedLines', () => {
  it('numbers the lines of a string from 1', () => {
    expect([...numberedLines('a\r\nb\nc')]).toEqual([
      { text: 'a', lineNo: 1 },
      { text: 'b', lineNo: 2 },
      { text: 'c', lineNo: 3 },
    ]);
  });

  it('accepts any iterable of lines', () => {
    expect([...numberedLines(['x\n', 'y'])].map(l => l.text)).toEqual(['x', 'y']);
  });
});

describe('isBlankOrComment', () => {
  it('matches empty, whitespace and # lines', () => {
    expect(isBlankOrComment('')).toBe(true);
    expect(isBlankOrComment('   ')).toBe(true);
    expect(isBlankOrComment('  # note')).toBe(true);
    expect(isBlankOrComment('H SZV')).toBe(false);
  });
});

describe('splitCp2kBlocks', () => {
  it('opens a block at each element header and keeps file line numbers', () => {
    const text = '# head\nH A\n1\n\nHe B\n2\n';
    const blocks = [...splitCp2kBlocks(text)];
    expect(blocks).toEqual([
      [{ text: 'H A', lineNo: 2 }, { text: '1', lineNo: 3 }],
      [{ text: 'He B', lineNo: 5 }, { text: '2', lineNo: 6 }],
    ]);
  });
});

describe('numeric tokens', () => {
  it('parses decimal and Fortran floats', () => {
    expect(parseFloatToken('1.5')).toBe(1.5);
    expect(parseFloatToken('-.25')).toBe(-0.25);
    expect(parseFloatToken('0.15D+01')).toBe(1.5);
    expect(parseFloatToken('2e-3')).toBe(0.002);
    expect(parseFloatToken('1.2.3')).toBeUndefined();
    expect(parseFloatToken('abc')).toBeUndefined();
  });

  it('parses strict integers', () => {
    expect(parseIntToken('42')).toBe(42);
    expect(parseIntToken('-3')).toBe(-3);
    expect(parseIntToken('4.0')).toBeUndefined();
  });
});

describe('LineCursor', () => {
  const lines = [
    { text: 'one', lineNo: 3 },
    { text: '2 3', lineNo: 4 },
  ];

  it('walks the lines', () => {
    const cursor = new LineCursor(lines, { format: 'test' });
    expect(cursor.remaining).toBe(2);
    expect(cursor.peek()?.text).toBe('one');
    expect(cursor.next('first').lineNo).toBe(3);
    expect(cursor.ints(cursor.next('second'), 'pair')).toEqual([2, 3]);
    expect(cursor.done).toBe(true);
    expect(cursor.lineNo).toBe(4);
  });

  it('names the block and line in errors', () => {
    const cursor = new LineCursor(lines, { format: 'test', block: 'H X' });
    cursor.take(2, 'all');
    expectCodecError(() => cursor.next('more'), 'PARSE_ERROR', /^test H X: premature end of input while reading more \(line 4\)$/);
    expect(cursor.invalid('bad count', lines[0]).code).toBe('VALIDATION_ERROR');
    expect(cursor.invalid('bad count', lines[0]).data).toEqual({ format: 'test', block: 'H X', line: 3 });
  });

  it('rejects non-numeric tokens', () => {
    const cursor = new LineCursor(lines, { format: 'test' });
    expectCodecError(() => cursor.floats(lines[0]!, 'row'), 'PARSE_ERROR', /expected a number for row, got "one" \(line 3\)/);
    expectCodecError(() => cursor.int(undefined, lines[1]!, 'count'), 'PARSE_ERROR', /expected an integer for count, got nothing/);
  });
});

describe('deriveIdentifiers', () => {
  it('takes the longest identifier as the name', () => {
    expect(deriveIdentifiers(['GTH-PBE', 'GTH-PBE-q4'])).toEqual({
      name: 'GTH-PBE-q4',
      aliases: ['GTH-PBE-q4', 'GTH-PBE'],
      tags: ['GTH', 'PBE', 'q4'],
    });
  });

  it('keeps the original order among identifiers of equal length', () => {
    expect(deriveIdentifiers(['AB-q1', 'CD-q2']).name).toBe('AB-q1');
  });

  it('needs at least one identifier', () => {
    expectCodecError(() => deriveIdentifiers([]), 'PARSE_ERROR');
  });
});

describe('deriveValenceElectrons', () => {
  it('reads a single qN tag', () => {
    expect(deriveValenceElectrons('C', ['GTH', 'q4'])).toBe(4);
    expect(deriveValenceElectrons('C', ['q4', 'q4'])).toBe(4);
  });

  it('gives null for conflicting qN tags', () => {
    expect(deriveValenceElectrons('C', ['q4', 'q6'])).toBeNull();
  });

  it('uses the atomic number for all-electron tags', () => {
    expect(deriveValenceElectrons('Fe', ['ALLELECTRON'])).toBe(26);
  });

  it('rejects an unknown element on an all-electron entry', () => {
    expectCodecError(() => deriveValenceElectrons('Xx', ['ALL']), 'VALIDATION_ERROR');
  });
});

describe('identifiersFromFilename', () => {
  it('splits element and name', () => {
    expect(identifiersFromFilename('/lib/H.cc-pVDZ.gamess')).toEqual({ element: 'H', name: 'cc-pVDZ' });
    expect(identifiersFromFilename('README')).toBeUndefined();
  });
});

import { describe, it, expect } from 'vitest';
import { StringSink, formatFloat, formatInt, renderToString } from '../formats/output.js';
import { expectCodecError } from './expectCodecError.js';

describe('formatFloat', () => {
  it('right-aligns fixed-point values', () => {
    expect(formatFloat(12.5, { width: 18, precision: 12 })).toBe('   12.500000000000');
    expect(formatFloat(-0.0125, { width: 18, precision: 12 })).toBe('   -0.012500000000');
  });

  it('reserves a blank for the sign with sign "space"', () => {
    expect(formatFloat(0.025, { width: 14, precision: 12, sign: 'space' })).toBe(' 0.025000000000');
    expect(formatFloat(-0.025, { width: 14, precision: 12, sign: 'space' })).toBe('-0.025000000000');
    expect(formatFloat(1, { precision: 2, sign: 'plus' })).toBe('+1.00');
  });

  it('keeps the sign of negative zero', () => {
    expect(formatFloat(-0, { precision: 3 })).toBe('-0.000');
  });

  it('rounds to the requested precision', () => {
    expect(formatFloat(3.14159, { width: 8, precision: 3 })).toBe('   3.142');
  });

  it('writes exponential notation with a two-digit exponent', () => {
    expect(formatFloat(1234.5, { precision: 4, notation: 'exponential' })).toBe('1.2345e+03');
    expect(formatFloat(0.00015, { precision: 2, notation: 'exponential', exponentChar: 'D' })).toBe('1.50D-04');
    expect(formatFloat(-2, { width: 12, precision: 3, notation: 'exponential', exponentChar: 'E' })).toBe('  -2.000E+00');
  });

  it('rejects non-finite values', () => {
    expectCodecError(() => formatFloat(Number.NaN, { precision: 2 }), 'VALIDATION_ERROR');
    expectCodecError(() => formatFloat(Number.POSITIVE_INFINITY, { precision: 2 }), 'VALIDATION_ERROR');
  });
});

describe('formatInt', () => {
  it('pads to the width', () => {
    expect(formatInt(7, 5)).toBe('    7');
    expect(formatInt(123456, 5)).toBe('123456');
  });
});

describe('StringSink', () => {
  it('collects chunks', () => {
    const sink = new StringSink();
    sink.write('a');
    sink.write('b\n');
    expect(sink.toString()).toBe('ab\n');
    expect(renderToString(s => s.write('x'))).toBe('x');
  });
});

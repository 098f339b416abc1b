/**
 * Output side of the codecs: text sinks and fixed-width number formatting.
 */

import { validationError } from '../shared/index.js';

/** Anything with a write(string) method: process.stdout, fs.WriteStream, StringSink. */
export interface TextSink {
  write(chunk: string): unknown;
}

export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export function renderToString(render: (sink: TextSink) => void): string {
  const sink = new StringSink();
  render(sink);
  return sink.toString();
}

export interface FloatFormat {
  /** Minimum field width; the value is right-aligned. */
  width?: number;
  precision: number;
  /** 'space' puts a blank where a minus sign would go. */
  sign?: 'minus' | 'space' | 'plus';
  notation?: 'fixed' | 'exponential';
  /** Exponent marker for exponential notation ('D' for Fortran-style output). */
  exponentChar?: 'e' | 'E' | 'D';
}

function exponential(magnitude: number, precision: number, marker: string): string {
  const [mantissa, exponent = '0'] = magnitude.toExponential(precision).split('e');
  const expValue = Number(exponent);
  const expDigits = String(Math.abs(expValue)).padStart(2, '0');
  return `${mantissa}${marker}${expValue < 0 ? '-' : '+'}${expDigits}`;
}

export function formatFloat(value: number, fmt: FloatFormat): string {
  if (!Number.isFinite(value)) {
    throw validationError(`cannot format non-finite value ${value}`);
  }
  const negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);
  const body = fmt.notation === 'exponential'
    ? exponential(magnitude, fmt.precision, fmt.exponentChar ?? 'e')
    : magnitude.toFixed(fmt.precision);

  let signChar = '';
  if (negative) signChar = '-';
  else if (fmt.sign === 'space') signChar = ' ';
  else if (fmt.sign === 'plus') signChar = '+';

  return (signChar + body).padStart(fmt.width ?? 0);
}

export function formatInt(value: number, width = 0): string {
  return String(value).padStart(width);
}

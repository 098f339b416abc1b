/**
 * Line-level plumbing shared by the text codecs: numbered line sources, the
 * block-boundary matchers used by the CP2K files, a cursor with positioned
 * errors, numeric token parsing and identifier/tag derivation.
 */

import { CodecError, parseError, validationError } from '../shared/index.js';
import { atomicNumber } from './elements.js';

export const EMPTY_LINE_MATCH = /^\s*(#.*)?$/;
export const BLOCK_MATCH = /^\s*[A-Za-z]{1,3}\s+\S+/;
const N_VAL_EL_MATCH = /^q(\d+)$/;
const ALL_ELECTRON_TAGS = ['ALL', 'ALLELECTRON'];

const FLOAT_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)([eEdD][+-]?\d+)?$/;
const INT_TOKEN = /^[+-]?\d+$/;

export type LineSource = string | Iterable<string>;

export interface SourceLine {
  text: string;
  lineNo: number;
}

export interface ErrorContext {
  format: string;
  block?: string;
}

export function* numberedLines(source: LineSource): Generator<SourceLine> {
  const lines = typeof source === 'string' ? source.split(/\r?\n/) : source;
  let lineNo = 0;
  for (const raw of lines) {
    lineNo += 1;
    yield { text: raw.replace(/\r?\n$/, ''), lineNo };
  }
}

export function isBlankOrComment(text: string): boolean {
  return EMPTY_LINE_MATCH.test(text);
}

export function splitTokens(text: string): string[] {
  const trimmed = text.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

/**
 * Group the non-blank, non-comment lines of a CP2K data file into blocks.
 * A line matching BLOCK_MATCH opens a new block; the last block is flushed
 * at end of input. Lines are trimmed.
 */
export function* splitCp2kBlocks(source: LineSource): Generator<SourceLine[]> {
  let current: SourceLine[] = [];

  for (const line of numberedLines(source)) {
    if (isBlankOrComment(line.text)) continue;

    if (BLOCK_MATCH.test(line.text) && current.length > 0) {
      yield current;
      current = [];
    }
    current.push({ text: line.text.trim(), lineNo: line.lineNo });
  }

  if (current.length > 0) yield current;
}

function describe(context: ErrorContext): string {
  return context.block ? `${context.format} ${context.block}` : context.format;
}

export function parseFloatToken(token: string): number | undefined {
  if (!FLOAT_TOKEN.test(token)) return undefined;
  return Number(token.replace(/[dD]/, 'e'));
}

export function parseIntToken(token: string): number | undefined {
  return INT_TOKEN.test(token) ? Number(token) : undefined;
}

export class LineCursor {
  private index = 0;

  constructor(
    private readonly lines: readonly SourceLine[],
    public context: ErrorContext
  ) {}

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  get remaining(): number {
    return this.lines.length - this.index;
  }

  /** Line number of the next line, or of the last line once exhausted. */
  get lineNo(): number {
    const line = this.lines[Math.min(this.index, this.lines.length - 1)];
    return line?.lineNo ?? 0;
  }

  peek(): SourceLine | undefined {
    return this.lines[this.index];
  }

  next(what: string): SourceLine {
    const line = this.lines[this.index];
    if (line === undefined) {
      throw this.fail(`premature end of input while reading ${what}`);
    }
    this.index += 1;
    return line;
  }

  take(count: number, what: string): SourceLine[] {
    const out: SourceLine[] = [];
    for (let i = 0; i < count; i++) out.push(this.next(what));
    return out;
  }

  fail(message: string, line?: SourceLine): CodecError {
    const lineNo = line?.lineNo ?? this.lineNo;
    return parseError(`${describe(this.context)}: ${message} (line ${lineNo})`, {
      ...this.context,
      line: lineNo,
    });
  }

  invalid(message: string, line?: SourceLine): CodecError {
    const lineNo = line?.lineNo ?? this.lineNo;
    return validationError(`${describe(this.context)}: ${message} (line ${lineNo})`, {
      ...this.context,
      line: lineNo,
    });
  }

  float(token: string | undefined, line: SourceLine, what: string): number {
    const value = token === undefined ? undefined : parseFloatToken(token);
    if (value === undefined) {
      throw this.fail(`expected a number for ${what}, got ${token === undefined ? 'nothing' : `"${token}"`}`, line);
    }
    return value;
  }

  int(token: string | undefined, line: SourceLine, what: string): number {
    const value = token === undefined ? undefined : parseIntToken(token);
    if (value === undefined) {
      throw this.fail(`expected an integer for ${what}, got ${token === undefined ? 'nothing' : `"${token}"`}`, line);
    }
    return value;
  }

  floats(line: SourceLine, what: string): number[] {
    return splitTokens(line.text).map(token => this.float(token, line, what));
  }

  ints(line: SourceLine, what: string): number[] {
    return splitTokens(line.text).map(token => this.int(token, line, what));
  }
}

// ── Identifier derivation ─────────────────────────────────────────────────

export interface Identifiers {
  name: string;
  aliases: string[];
  tags: string[];
}

/**
 * The longest identifier becomes the name (some libraries encode the number
 * of valence electrons as a trailing -qN); the rest follow it as aliases.
 */
export function deriveIdentifiers(identifiers: readonly string[]): Identifiers {
  const sorted = [...identifiers].sort((a, b) => b.length - a.length);
  const [name, ...rest] = sorted;
  if (name === undefined) {
    throw parseError('missing identifier on header line');
  }
  return { name, aliases: [name, ...rest], tags: name.split('-') };
}

/**
 * Number of valence electrons encoded in the tags: a single distinct qN value
 * wins; conflicting qN tags give null. Without qN, an ALL/ALLELECTRON tag
 * means the full atomic number.
 */
export function deriveValenceElectrons(element: string, tags: readonly string[]): number | null {
  const counts = new Set<number>();
  for (const tag of tags) {
    const match = N_VAL_EL_MATCH.exec(tag);
    if (match?.[1] !== undefined) counts.add(Number(match[1]));
  }

  if (counts.size === 1) {
    const [count] = counts;
    if (count !== undefined) return count;
  }

  if (tags.some(tag => ALL_ELECTRON_TAGS.includes(tag))) {
    const Z = atomicNumber(element);
    if (Z === undefined) {
      throw validationError(`unknown element symbol "${element}" on an all-electron entry`, { element });
    }
    return Z;
  }

  return null;
}

/**
 * Library files such as "H.cc-pVDZ.gamess" carry the element and the name
 * only in their file name.
 */
export function identifiersFromFilename(filename: string): { element: string; name: string } | undefined {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const match = /^([A-Za-z]{1,3})\.(.+?)(\.[A-Za-z0-9]+)?$/.exec(base);
  if (!match?.[1] || !match[2]) return undefined;
  return { element: match[1], name: match[2] };
}

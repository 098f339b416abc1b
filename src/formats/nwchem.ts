/**
 * NWChem basis set and ECP blocks.
 *
 *   BASIS "cc-pVDZ" PRINT          ECP
 *   H    S                         Ne nelec 2
 *       13.01      0.0197          Ne ul
 *        1.962     0.1380          2    1.0000000   0.0000000
 *   H    P                         Ne S
 *        0.727     1.0000          2    4.6370000  -1.1020000
 *   END                            END
 *
 * A shell lists "exponent contraction..." rows until the next header; an SP
 * (or L) shell has two contraction columns, one for s and one for p.
 */

import { expandShells } from './basisOps.js';
import { resolveElement } from './elements.js';
import { addTerm, emptyEcpFunction, ecpTerms, makeEcpRecord, toDiskOrder } from './ecp.js';
import {
  LineCursor,
  deriveValenceElectrons,
  isBlankOrComment,
  numberedLines,
  splitTokens,
  type LineSource,
  type SourceLine,
} from './lexer.js';
import { formatFloat, formatInt, renderToString, type FloatFormat, type TextSink } from './output.js';
import {
  angularMomentumOf,
  filterRecords,
  shellLetter,
  type AngularMomentumEntry,
  type BasisSetBlock,
  type BasisSetRecord,
  type EcpFunction,
  type EcpPseudopotentialRecord,
  type RecordFilter,
} from './records.js';
import { validateBasisSet, validateEcpPseudopotential } from './schemas.js';

const BASIS_FORMAT = 'NWChem basis set';
const ECP_FORMAT = 'NWChem ECP';

const SECTION_START = /^\s*(BASIS|ECP|SO)(\s|$)/i;
const SECTION_END = /^\s*END\s*$/i;
const QUOTED_NAME = /"([^"]+)"/;

const NUMBER_FORMAT: FloatFormat = { width: 22, precision: 12 };
const ECP_NUMBER_FORMAT: FloatFormat = { width: 22, precision: 14 };

export interface NwchemParseOptions extends RecordFilter {
  /** Name for the parsed records; defaults to the quoted BASIS name. */
  name?: string;
}

function canonicalElement(cursor: LineCursor, token: string, line: SourceLine): string {
  const entry = resolveElement(token);
  if (!entry) throw cursor.fail(`unknown element "${token}"`, line);
  return entry.symbol;
}

function cursorOver(source: LineSource, format: string): LineCursor {
  const lines = [...numberedLines(source)].filter(line => !isBlankOrComment(line.text));
  return new LineCursor(lines, { format });
}

// ── Basis sets ────────────────────────────────────────────────────────────

interface RawShell {
  element: string;
  letter: string;
  header: SourceLine;
  rows: number[][];
}

function shellToBlock(cursor: LineCursor, shell: RawShell): BasisSetBlock {
  const first = shell.rows[0];
  if (first === undefined) {
    throw cursor.fail(`${shell.element} ${shell.letter} shell has no primitives`, shell.header);
  }
  const width = first.length;
  if (shell.rows.some(row => row.length !== width)) {
    throw cursor.invalid(`${shell.element} ${shell.letter} shell rows differ in column count`, shell.header);
  }

  let l: AngularMomentumEntry[];
  const letter = shell.letter.toLowerCase();
  if (letter === 'sp' || letter === 'l') {
    if (width !== 3) {
      throw cursor.invalid(`${shell.element} SP shell needs exponent, s and p columns, got ${width}`, shell.header);
    }
    l = [[0, 1], [1, 1]];
  } else {
    const lqn = angularMomentumOf(letter);
    if (lqn === undefined) throw cursor.fail(`unknown shell "${shell.letter}"`, shell.header);
    if (width < 2) throw cursor.invalid(`${shell.element} ${shell.letter} shell has no contraction column`, shell.header);
    l = [[lqn, width - 1]];
  }

  return { n: (l[0]?.[0] ?? 0) + 1, l, coefficients: shell.rows };
}

export function parseNwchemBasisSets(source: LineSource, options: NwchemParseOptions = {}): BasisSetRecord[] {
  const cursor = cursorOver(source, BASIS_FORMAT);
  const shells: RawShell[] = [];
  let basisName: string | undefined;
  let skipping = false;
  let current: RawShell | undefined;

  while (!cursor.done) {
    const line = cursor.next('basis line');

    const section = SECTION_START.exec(line.text);
    if (section?.[1] !== undefined) {
      const keyword = section[1].toUpperCase();
      skipping = keyword !== 'BASIS';
      if (keyword === 'BASIS') basisName = QUOTED_NAME.exec(line.text)?.[1] ?? splitTokens(line.text)[1];
      current = undefined;
      continue;
    }
    if (SECTION_END.test(line.text)) {
      skipping = false;
      current = undefined;
      continue;
    }
    if (skipping) continue;

    const tokens = splitTokens(line.text);
    const [head, letter] = tokens;
    if (head !== undefined && /^[A-Za-z]/.test(head)) {
      if (letter === undefined || tokens.length !== 2) {
        throw cursor.fail(`expected "<element> <shell>" header, got "${line.text}"`, line);
      }
      current = { element: canonicalElement(cursor, head, line), letter, header: line, rows: [] };
      shells.push(current);
      continue;
    }

    if (!current) throw cursor.fail('primitive row before any shell header', line);
    current.rows.push(cursor.floats(line, 'primitive row'));
  }

  const name = options.name ?? basisName ?? 'nwchem';
  const byElement = new Map<string, BasisSetBlock[]>();
  for (const shell of shells) {
    const blocks = byElement.get(shell.element) ?? [];
    blocks.push(shellToBlock(cursor, shell));
    byElement.set(shell.element, blocks);
  }

  const tags = name.split('-');
  const records = [...byElement].map(([element, blocks]): BasisSetRecord => ({
    element,
    name,
    aliases: [name],
    tags: [...tags],
    n_el: deriveValenceElectrons(element, tags),
    version: 1,
    blocks,
  }));
  return [...filterRecords(records, options)];
}

/**
 * One "<element> <shell>" section per contracted shell: a block with
 * l = [(0, 2), (1, 1)] yields two s sections and one p section, each
 * reusing the exponent column.
 */
export function writeNwchemBasisSet(sink: TextSink, record: BasisSetRecord): void {
  const { element, blocks } = validateBasisSet(record);

  for (const block of blocks) {
    for (const shell of expandShells(block)) {
      sink.write(`${element}    ${shell.label}\n`);
      for (const [exponent = 0, coefficient = 0] of shell.rows) {
        sink.write(formatFloat(exponent, NUMBER_FORMAT) + formatFloat(coefficient, NUMBER_FORMAT) + '\n');
      }
    }
  }
}

export function writeNwchemBasisLibrary(sink: TextSink, records: readonly BasisSetRecord[], name?: string): void {
  const first = records[0];
  sink.write(`BASIS "${name ?? first?.name ?? 'ao basis'}" PRINT\n`);
  for (const record of records) writeNwchemBasisSet(sink, record);
  sink.write('END\n');
}

export function formatNwchemBasisSets(records: readonly BasisSetRecord[], name?: string): string {
  return renderToString(sink => writeNwchemBasisLibrary(sink, records, name));
}

// ── ECPs ──────────────────────────────────────────────────────────────────

interface RawEcp {
  element: string;
  core?: number;
  header: SourceLine;
  channels: Map<number | 'ul', EcpFunction>;
}

function assembleEcp(cursor: LineCursor, raw: RawEcp, name: string | undefined): EcpPseudopotentialRecord {
  const local = raw.channels.get('ul');
  if (!local) throw cursor.invalid(`${raw.element} ECP has no ul channel`, raw.header);
  if (raw.core === undefined) throw cursor.fail(`${raw.element} ECP has no nelec line`, raw.header);

  const lmax = raw.channels.size - 1;
  const functions: EcpFunction[] = [];
  for (let l = 0; l < lmax; l++) {
    const fn = raw.channels.get(l);
    if (!fn) throw cursor.invalid(`${raw.element} ECP is missing the ${shellLetter(l)} channel`, raw.header);
    functions.push(fn);
  }
  functions.push(local);

  return makeEcpRecord({
    element: raw.element,
    name: name ?? `${raw.element}-ECP`,
    core_electrons: raw.core,
    functions,
  });
}

export function parseNwchemPseudopotentials(source: LineSource, options: NwchemParseOptions = {}): EcpPseudopotentialRecord[] {
  const cursor = cursorOver(source, ECP_FORMAT);
  const ecps = new Map<string, RawEcp>();
  let skipping = false;
  let current: EcpFunction | undefined;

  const ecpFor = (element: string, line: SourceLine): RawEcp => {
    const existing = ecps.get(element);
    if (existing) return existing;
    const created: RawEcp = { element, header: line, channels: new Map() };
    ecps.set(element, created);
    return created;
  };

  while (!cursor.done) {
    const line = cursor.next('ECP line');

    const section = SECTION_START.exec(line.text);
    if (section?.[1] !== undefined) {
      skipping = section[1].toUpperCase() !== 'ECP';
      current = undefined;
      continue;
    }
    if (SECTION_END.test(line.text)) {
      skipping = false;
      current = undefined;
      continue;
    }
    if (skipping) continue;

    const tokens = splitTokens(line.text);
    const [head, second, third] = tokens;
    if (head !== undefined && /^[A-Za-z]/.test(head)) {
      const raw = ecpFor(canonicalElement(cursor, head, line), line);
      if (second?.toLowerCase() === 'nelec') {
        raw.core = cursor.int(third, line, 'nelec');
        current = undefined;
        continue;
      }
      if (second === undefined || tokens.length !== 2) {
        throw cursor.fail(`expected "<element> <channel>" header, got "${line.text}"`, line);
      }
      const key = second.toLowerCase() === 'ul' ? 'ul' : angularMomentumOf(second);
      if (key === undefined) throw cursor.fail(`unknown ECP channel "${second}"`, line);
      if (raw.channels.has(key)) throw cursor.fail(`duplicate ${second} channel for ${raw.element}`, line);
      current = emptyEcpFunction();
      raw.channels.set(key, current);
      continue;
    }

    if (!current) throw cursor.fail('ECP term before any channel header', line);
    if (tokens.length !== 3) throw cursor.fail(`expected "polynom exponent prefactor", got "${line.text}"`, line);
    const [polynom, exponent, prefactor] = cursor.floats(line, 'ECP term');
    addTerm(current, prefactor ?? 0, polynom ?? 0, exponent ?? 0);
  }

  const records = [...ecps.values()].map(raw => assembleEcp(cursor, raw, options.name));
  return [...filterRecords(records, options)];
}

export function writeNwchemEcp(sink: TextSink, record: EcpPseudopotentialRecord): void {
  const ecp = validateEcpPseudopotential(record);
  const { element } = ecp;

  sink.write(`${element} nelec ${ecp.core_electrons}\n`);
  toDiskOrder(ecp.functions).forEach((fn, i) => {
    sink.write(`${element} ${i === 0 ? 'ul' : shellLetter(i - 1).toUpperCase()}\n`);
    for (const term of ecpTerms(fn)) {
      sink.write(
        formatInt(term.polynom, 4)
        + formatFloat(term.exponent, ECP_NUMBER_FORMAT)
        + formatFloat(term.prefactor, ECP_NUMBER_FORMAT)
        + '\n',
      );
    }
  });
}

export function writeNwchemEcpLibrary(sink: TextSink, records: readonly EcpPseudopotentialRecord[]): void {
  sink.write('ECP\n');
  for (const record of records) writeNwchemEcp(sink, record);
  sink.write('END\n');
}

export function formatNwchemPseudopotentials(records: readonly EcpPseudopotentialRecord[]): string {
  return renderToString(sink => writeNwchemEcpLibrary(sink, records));
}

/**
 * Gaussian94 basis set and ECP blocks.
 *
 *   H     0                      NE     0
 *   S   3   1.00                 NE-ECP     1     2
 *        13.0100   0.0197        ul potential
 *         1.9620   0.1380          1
 *         0.4446   0.4781        2      1.00000000      0.00000000
 *   ****                         s-ul potential
 *                                  ...
 */

import { expandShells } from './basisOps.js';
import { resolveElement } from './elements.js';
import {
  addTerm,
  diskChannelLabel,
  ecpTerms,
  emptyEcpFunction,
  fromDiskOrder,
  makeEcpRecord,
  toDiskOrder,
} from './ecp.js';
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
  type AngularMomentumEntry,
  type BasisSetBlock,
  type BasisSetRecord,
  type EcpFunction,
  type EcpPseudopotentialRecord,
  type RecordFilter,
} from './records.js';
import { validateBasisSet, validateEcpPseudopotential } from './schemas.js';

const BASIS_FORMAT = 'Gaussian94 basis set';
const ECP_FORMAT = 'Gaussian ECP';
const TERMINATOR = '****';

const NUMBER_FORMAT: FloatFormat = { width: 20, precision: 10 };

export interface GaussianParseOptions extends RecordFilter {
  /** Gaussian94 basis files carry no name; defaults to "gaussian". */
  name?: string;
}

function isSkippable(text: string): boolean {
  return isBlankOrComment(text) || /^\s*!/.test(text);
}

function cursorOver(source: LineSource, format: string): LineCursor {
  const lines = [...numberedLines(source)].filter(line => !isSkippable(line.text));
  return new LineCursor(lines, { format });
}

/** "<SYM> 0" opens an element; a leading "-" is allowed. */
function parseElementHeader(cursor: LineCursor, line: SourceLine): string {
  const [symbol = '', zero, ...rest] = splitTokens(line.text);
  if (zero !== '0' || rest.length > 0) {
    throw cursor.fail(`expected "<element> 0", got "${line.text}"`, line);
  }
  const entry = resolveElement(symbol.replace(/^-/, ''));
  if (!entry) throw cursor.fail(`unknown element "${symbol}"`, line);
  return entry.symbol;
}

// ── Basis sets ────────────────────────────────────────────────────────────

function parseShell(cursor: LineCursor, element: string, header: SourceLine): BasisSetBlock {
  const tokens = splitTokens(header.text);
  const [letter = '', countToken, scaleToken] = tokens;
  if (tokens.length < 2 || tokens.length > 3) {
    throw cursor.fail(`expected "<shell> <nprim> [scale]", got "${header.text}"`, header);
  }
  const nprim = cursor.int(countToken, header, 'primitive count');
  const scale = scaleToken === undefined ? 1 : cursor.float(scaleToken, header, 'scale factor');

  let l: AngularMomentumEntry[];
  const combined = letter.toUpperCase() === 'SP' || letter.toUpperCase() === 'L';
  if (combined) {
    l = [[0, 1], [1, 1]];
  } else {
    const lqn = angularMomentumOf(letter);
    if (lqn === undefined) throw cursor.fail(`unknown shell "${letter}" for ${element}`, header);
    l = [[lqn, 1]];
  }
  const width = combined ? 3 : 2;

  const coefficients = cursor.take(nprim, `${element} ${letter} primitives`).map(line => {
    const row = cursor.floats(line, 'primitive row');
    if (row.length !== width) {
      throw cursor.fail(`expected ${width} columns in ${element} ${letter} row, got ${row.length}`, line);
    }
    const [exponent = 0, ...rest] = row;
    return [exponent * scale * scale, ...rest];
  });

  return { n: (l[0]?.[0] ?? 0) + 1, l, coefficients };
}

export function parseGaussianBasisSets(source: LineSource, options: GaussianParseOptions = {}): BasisSetRecord[] {
  const cursor = cursorOver(source, BASIS_FORMAT);
  const name = options.name ?? 'gaussian';
  const tags = name.split('-');
  const records: BasisSetRecord[] = [];
  let current: BasisSetRecord | undefined;

  while (!cursor.done) {
    const line = cursor.next('basis line');

    // library exports open with a terminator line
    if (line.text.trim() === TERMINATOR) {
      current = undefined;
      continue;
    }

    if (!current) {
      const element = parseElementHeader(cursor, line);
      current = {
        element,
        name,
        aliases: [name],
        tags: [...tags],
        n_el: deriveValenceElectrons(element, tags),
        version: 1,
        blocks: [],
      };
      records.push(current);
      continue;
    }

    current.blocks.push(parseShell(cursor, current.element, line));
  }

  if (current) throw cursor.fail(`${current.element} is not terminated by "${TERMINATOR}"`);
  return [...filterRecords(records, options)];
}

export function writeGaussianBasisSet(sink: TextSink, record: BasisSetRecord): void {
  const { element, blocks } = validateBasisSet(record);
  sink.write(`${element}     0\n`);

  for (const block of blocks) {
    for (const shell of expandShells(block, true)) {
      sink.write(`${shell.label}   ${shell.rows.length}   1.00\n`);
      for (const row of shell.rows) {
        sink.write(row.map(value => formatFloat(value, NUMBER_FORMAT)).join('') + '\n');
      }
    }
  }
  sink.write(`${TERMINATOR}\n`);
}

export function formatGaussianBasisSets(records: readonly BasisSetRecord[]): string {
  return renderToString(sink => records.forEach(record => writeGaussianBasisSet(sink, record)));
}

// ── ECPs ──────────────────────────────────────────────────────────────────

function parseChannel(cursor: LineCursor, name: string): EcpFunction {
  cursor.next(`${name} channel label`);
  const countLine = cursor.next(`${name} term count`);
  const [countToken, ...extra] = splitTokens(countLine.text);
  if (extra.length > 0) throw cursor.fail(`expected a term count, got "${countLine.text}"`, countLine);
  const count = cursor.int(countToken, countLine, 'term count');

  const fn = emptyEcpFunction();
  for (const line of cursor.take(count, `${name} terms`)) {
    const numbers = cursor.floats(line, 'ECP term');
    if (numbers.length !== 3) throw cursor.fail(`expected "polynom exponent prefactor", got "${line.text}"`, line);
    const [polynom = 0, exponent = 0, prefactor = 0] = numbers;
    addTerm(fn, prefactor, polynom, exponent);
  }
  return fn;
}

export function parseGaussianPseudopotentials(
  source: LineSource,
  options: RecordFilter = {},
): EcpPseudopotentialRecord[] {
  const cursor = cursorOver(source, ECP_FORMAT);
  const records: EcpPseudopotentialRecord[] = [];

  while (!cursor.done) {
    const line = cursor.next('ECP header');
    if (line.text.trim() === TERMINATOR) continue;

    const element = parseElementHeader(cursor, line);
    const header = cursor.next(`${element} ECP name line`);
    const tokens = splitTokens(header.text);
    const [name = '', lmaxToken, coreToken] = tokens;
    if (tokens.length !== 3) throw cursor.fail(`expected "<name> <lmax> <core>", got "${header.text}"`, header);
    const lmax = cursor.int(lmaxToken, header, 'lmax');
    const core = cursor.int(coreToken, header, 'core electrons');

    cursor.context = { format: ECP_FORMAT, block: name };
    const channels: EcpFunction[] = [];
    for (let i = 0; i <= lmax; i++) channels.push(parseChannel(cursor, name));
    cursor.context = { format: ECP_FORMAT };

    records.push(makeEcpRecord({ element, name, core_electrons: core, functions: fromDiskOrder(channels) }));
  }

  return [...filterRecords(records, options)];
}

export function writeGaussianEcp(sink: TextSink, record: EcpPseudopotentialRecord): void {
  const ecp = validateEcpPseudopotential(record);
  sink.write(`${ecp.element}     0\n`);
  sink.write(`${ecp.name}     ${ecp.lmax}     ${ecp.core_electrons}\n`);

  toDiskOrder(ecp.functions).forEach((fn, i) => {
    sink.write(`${diskChannelLabel(i)} potential\n`);
    sink.write(`${formatInt(fn.prefactors.length, 3)}\n`);
    for (const term of ecpTerms(fn)) {
      sink.write(
        String(term.polynom)
        + formatFloat(term.exponent, NUMBER_FORMAT)
        + formatFloat(term.prefactor, NUMBER_FORMAT)
        + '\n',
      );
    }
  });
}

export function formatGaussianPseudopotentials(records: readonly EcpPseudopotentialRecord[]): string {
  return renderToString(sink => records.forEach(record => writeGaussianEcp(sink, record)));
}

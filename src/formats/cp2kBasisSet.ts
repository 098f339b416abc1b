/**
 * CP2K basis set files (BASIS_MOLOPT, GTO_BASIS_SETS, ...).
 *
 * Layout of one entry:
 *   Element  Name  Alias...
 *   n_sets
 *   n  lmin  lmax  nexp  nshell(lmin) ... nshell(lmax)
 *   exponent  coeff(shell 1)  coeff(shell 2) ...      (nexp rows)
 *   ...                                               (repeated n_sets times)
 */

import {
  LineCursor,
  deriveIdentifiers,
  deriveValenceElectrons,
  isBlankOrComment,
  splitCp2kBlocks,
  splitTokens,
  type LineSource,
  type SourceLine,
} from './lexer.js';
import { formatFloat, renderToString, type FloatFormat, type TextSink } from './output.js';
import { filterRecords, type BasisSetBlock, type BasisSetRecord, type RecordFilter } from './records.js';
import { validateBasisSet } from './schemas.js';

const FORMAT = 'CP2K basis set';

export interface Cp2kBasisSetWriteOptions {
  exponentFormat?: FloatFormat;
  coefficientFormat?: FloatFormat;
  comment?: string;
}

export const DEFAULT_EXPONENT_FORMAT: FloatFormat = { width: 18, precision: 12 };
export const DEFAULT_COEFFICIENT_FORMAT: FloatFormat = { width: 14, precision: 12, sign: 'space' };

/**
 * Parse one entry given as its non-blank lines (header first).
 */
export function parseSingleCp2kBasisSet(lines: readonly (string | SourceLine)[]): BasisSetRecord {
  const numbered = lines
    .map((line, i) => (typeof line === 'string' ? { text: line.trim(), lineNo: i + 1 } : line))
    .filter(line => !isBlankOrComment(line.text));
  const cursor = new LineCursor(numbered, { format: FORMAT });

  const header = cursor.next('header');
  const [element, ...identifiers] = splitTokens(header.text);
  if (element === undefined || identifiers.length === 0) {
    throw cursor.fail('header must hold an element symbol and at least one name', header);
  }
  const { name, aliases, tags } = deriveIdentifiers(identifiers);
  cursor.context = { format: FORMAT, block: `${element} ${name}` };

  const n_el = deriveValenceElectrons(element, tags);

  const countLine = cursor.next('number of sets');
  const countTokens = splitTokens(countLine.text);
  if (countTokens.length !== 1) {
    throw cursor.fail(`expected a single set count, got "${countLine.text}"`, countLine);
  }
  const nBlocks = cursor.int(countTokens[0], countLine, 'number of sets');

  const blocks: BasisSetBlock[] = [];
  for (let b = 0; b < nBlocks; b++) {
    blocks.push(parseBlock(cursor));
  }

  const trailing = cursor.peek();
  if (trailing !== undefined) {
    throw cursor.fail(`unexpected line after ${nBlocks} set(s): "${trailing.text}"`, trailing);
  }

  return { element, name, aliases, tags, n_el, version: 1, blocks };
}

function parseBlock(cursor: LineCursor): BasisSetBlock {
  const qnLine = cursor.next('set header');
  const qn = cursor.ints(qnLine, 'set header');
  const [n, lmin, lmax, nexp, ...shellCounts] = qn;
  if (n === undefined || lmin === undefined || lmax === undefined || nexp === undefined) {
    throw cursor.fail('set header needs "n lmin lmax nexp nshell..."', qnLine);
  }
  if (lmax < lmin || lmin < 0 || nexp < 1) {
    throw cursor.fail(`invalid set header "${qnLine.text}"`, qnLine);
  }
  if (shellCounts.length !== lmax - lmin + 1) {
    throw cursor.invalid(
      `lmin=${lmin}..lmax=${lmax} declares ${lmax - lmin + 1} angular momenta but ${shellCounts.length} shell counts were given`,
      qnLine,
    );
  }

  const l = shellCounts.map((count, i): [number, number] => [lmin + i, count]);
  const width = 1 + shellCounts.reduce((sum, c) => sum + c, 0);

  const coefficients = cursor.take(nexp, `${nexp} exponent rows`).map(row => {
    if (/^[A-Za-z]/.test(row.text)) {
      throw cursor.fail(`premature end of set: expected ${nexp} exponent rows`, row);
    }
    const values = cursor.floats(row, 'exponent row');
    if (values.length !== width) {
      throw cursor.invalid(`row has ${values.length} values, expected ${width}`, row);
    }
    return values;
  });

  return { n, l, coefficients };
}

/**
 * Lazily yield every basis set of a CP2K file in one forward pass.
 */
export function* cp2kBasisSetIter(source: LineSource): Generator<BasisSetRecord> {
  for (const block of splitCp2kBlocks(source)) {
    yield parseSingleCp2kBasisSet(block);
  }
}

export function parseCp2kBasisSets(source: LineSource, filter: RecordFilter = {}): BasisSetRecord[] {
  return [...filterRecords(cp2kBasisSetIter(source), filter)];
}

/**
 * Blocks are written exactly as stored; merging shells that share exponents
 * is the caller's job (see mergeBlocks).
 */
export function writeCp2kBasisSet(
  sink: TextSink,
  record: BasisSetRecord,
  options: Cp2kBasisSetWriteOptions = {},
): void {
  const { element, name, blocks } = validateBasisSet(record);
  const eFmt = options.exponentFormat ?? DEFAULT_EXPONENT_FORMAT;
  const cFmt = options.coefficientFormat ?? DEFAULT_COEFFICIENT_FORMAT;

  sink.write(`# ${options.comment ?? ''}\n`);
  sink.write(`${element} ${name}\n${blocks.length}\n`);

  for (const block of blocks) {
    const first = block.l[0];
    const last = block.l[block.l.length - 1];
    if (first === undefined || last === undefined) continue;

    sink.write(`${block.n} ${first[0]} ${last[0]} ${block.coefficients.length} `);
    sink.write(block.l.map(([, count]) => String(count)).join(' '));
    sink.write('\n');

    for (const [exponent = 0, ...coeffs] of block.coefficients) {
      sink.write(formatFloat(exponent, eFmt));
      sink.write(' ');
      sink.write(coeffs.map(c => formatFloat(c, cFmt)).join(' '));
      sink.write('\n');
    }
  }
}

export function formatCp2kBasisSets(
  records: readonly BasisSetRecord[],
  options: Cp2kBasisSetWriteOptions = {},
): string {
  return renderToString(sink => {
    for (const record of records) writeCp2kBasisSet(sink, record, options);
  });
}

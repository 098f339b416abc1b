/**
 * GAMESS basis set ($DATA style) and ECP ($ECP style) blocks.
 *
 * Basis sets: an element line (symbol or English name) followed by shells
 * "<letter> <nprim>" and nprim rows "index exponent coeff"; L shells carry
 * an s and a p coefficient. ECPs: "name GEN core lmax", then lmax + 1
 * channel groups "<nterms> [label]" with rows "prefactor polynom exponent",
 * the local channel first.
 */

import { expandShells } from './basisOps.js';
import { elementName, resolveElement } from './elements.js';
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

const BASIS_FORMAT = 'GAMESS basis set';
const ECP_FORMAT = 'GAMESS ECP';

const BASIS_NUMBER_FORMAT: FloatFormat = { width: 22, precision: 10 };
const ECP_NUMBER_FORMAT: FloatFormat = { width: 17, precision: 8 };

export interface GamessParseOptions extends RecordFilter {
  /** GAMESS basis files carry no name; defaults to "gamess". */
  name?: string;
}

function isSkippable(text: string): boolean {
  return isBlankOrComment(text) || /^\s*[!$]/.test(text);
}

function cursorOver(source: LineSource, format: string): LineCursor {
  const lines = [...numberedLines(source)].filter(line => !isSkippable(line.text));
  return new LineCursor(lines, { format });
}

// ── Basis sets ────────────────────────────────────────────────────────────

function parseShell(cursor: LineCursor, element: string, header: SourceLine): BasisSetBlock {
  const [letter = '', countToken] = splitTokens(header.text);
  const nprim = cursor.int(countToken, header, 'primitive count');
  const combined = letter.toUpperCase() === 'L' || letter.toUpperCase() === 'SP';

  let l: AngularMomentumEntry[];
  if (combined) {
    l = [[0, 1], [1, 1]];
  } else {
    const lqn = angularMomentumOf(letter);
    if (lqn === undefined) throw cursor.fail(`unknown shell "${letter}" for ${element}`, header);
    l = [[lqn, 1]];
  }
  const width = combined ? 4 : 3;

  const coefficients = cursor.take(nprim, `${element} ${letter} primitives`).map((line, i) => {
    const tokens = splitTokens(line.text);
    if (tokens.length !== width) {
      throw cursor.fail(`expected ${width} columns in ${element} ${letter} row, got ${tokens.length}`, line);
    }
    const [indexToken, ...numbers] = tokens;
    const index = cursor.int(indexToken, line, 'primitive index');
    if (index !== i + 1) throw cursor.fail(`primitive index ${index} out of sequence`, line);
    return numbers.map(token => cursor.float(token, line, 'primitive row'));
  });

  return { n: (l[0]?.[0] ?? 0) + 1, l, coefficients };
}

export function parseGamessBasisSets(source: LineSource, options: GamessParseOptions = {}): BasisSetRecord[] {
  const cursor = cursorOver(source, BASIS_FORMAT);
  const name = options.name ?? 'gamess';
  const tags = name.split('-');
  const records: BasisSetRecord[] = [];
  let current: BasisSetRecord | undefined;

  while (!cursor.done) {
    const line = cursor.next('basis line');
    const tokens = splitTokens(line.text);

    if (tokens.length === 1) {
      const [token = ''] = tokens;
      const entry = resolveElement(token);
      if (!entry) throw cursor.fail(`unknown element "${token}"`, line);
      current = {
        element: entry.symbol,
        name,
        aliases: [name],
        tags: [...tags],
        n_el: deriveValenceElectrons(entry.symbol, tags),
        version: 1,
        blocks: [],
      };
      records.push(current);
      continue;
    }

    if (!current) throw cursor.fail('shell before any element line', line);
    if (tokens.length !== 2) throw cursor.fail(`expected "<shell> <nprim>", got "${line.text}"`, line);
    current.blocks.push(parseShell(cursor, current.element, line));
  }

  return [...filterRecords(records, options)];
}

export function writeGamessBasisSet(sink: TextSink, record: BasisSetRecord): void {
  const { element, blocks } = validateBasisSet(record);
  sink.write(`${(elementName(element) ?? element).toUpperCase()}\n`);

  for (const block of blocks) {
    for (const shell of expandShells(block, true)) {
      sink.write(`${shell.label === 'SP' ? 'L' : shell.label}   ${shell.rows.length}\n`);
      shell.rows.forEach((row, i) => {
        sink.write(formatInt(i + 1, 3) + row.map(value => formatFloat(value, BASIS_NUMBER_FORMAT)).join('') + '\n');
      });
    }
  }
  sink.write('\n');
}

export function formatGamessBasisSets(records: readonly BasisSetRecord[]): string {
  return renderToString(sink => records.forEach(record => writeGamessBasisSet(sink, record)));
}

// ── ECPs ──────────────────────────────────────────────────────────────────

export interface GamessEcpParseOptions extends RecordFilter {
  /** Element for entries whose name prefix ("NE-ECP" -> Ne) is not an element. */
  defaultElement?: string;
}

function parseChannel(cursor: LineCursor, name: string): EcpFunction {
  const header = cursor.next(`${name} channel header`);
  const [countToken] = splitTokens(header.text);
  const count = cursor.int(countToken, header, 'term count');

  const fn = emptyEcpFunction();
  for (const line of cursor.take(count, `${name} terms`)) {
    const numbers = cursor.floats(line, 'ECP term');
    if (numbers.length !== 3) throw cursor.fail(`expected "prefactor polynom exponent", got "${line.text}"`, line);
    const [prefactor = 0, polynom = 0, exponent = 0] = numbers;
    addTerm(fn, prefactor, polynom, exponent);
  }
  return fn;
}

export function parseGamessPseudopotentials(
  source: LineSource,
  options: GamessEcpParseOptions = {},
): EcpPseudopotentialRecord[] {
  const cursor = cursorOver(source, ECP_FORMAT);
  const records: EcpPseudopotentialRecord[] = [];

  while (!cursor.done) {
    const header = cursor.next('ECP header');
    const tokens = splitTokens(header.text);
    const [name = '', kind, coreToken, lmaxToken] = tokens;

    // "<name> NONE" marks an atom without a core potential
    if (kind?.toUpperCase() === 'NONE') continue;
    if (kind?.toUpperCase() !== 'GEN' || tokens.length !== 4) {
      throw cursor.fail(`expected "<name> GEN <core> <lmax>", got "${header.text}"`, header);
    }

    const entry = resolveElement(name.split('-')[0] ?? name)
      ?? (options.defaultElement === undefined ? undefined : resolveElement(options.defaultElement));
    if (!entry) throw cursor.fail(`cannot determine the element of "${name}"`, header);

    const core = cursor.int(coreToken, header, 'core electrons');
    const lmax = cursor.int(lmaxToken, header, 'lmax');
    cursor.context = { format: ECP_FORMAT, block: name };

    const channels: EcpFunction[] = [];
    for (let i = 0; i <= lmax; i++) channels.push(parseChannel(cursor, name));
    cursor.context = { format: ECP_FORMAT };

    records.push(makeEcpRecord({
      element: entry.symbol,
      name,
      core_electrons: core,
      functions: fromDiskOrder(channels),
    }));
  }

  return [...filterRecords(records, options)];
}

export function writeGamessEcp(sink: TextSink, record: EcpPseudopotentialRecord): void {
  const ecp = validateEcpPseudopotential(record);
  sink.write(`${ecp.name} GEN ${ecp.core_electrons} ${ecp.lmax}\n`);

  toDiskOrder(ecp.functions).forEach((fn, i) => {
    sink.write(`${formatInt(fn.prefactors.length, 5)}      ----- ${diskChannelLabel(i)} potential -----\n`);
    for (const term of ecpTerms(fn)) {
      sink.write(
        formatFloat(term.prefactor, ECP_NUMBER_FORMAT)
        + formatInt(term.polynom, 4)
        + formatFloat(term.exponent, ECP_NUMBER_FORMAT)
        + '\n',
      );
    }
  });
}

export function formatGamessPseudopotentials(records: readonly EcpPseudopotentialRecord[]): string {
  return renderToString(sink => records.forEach(record => writeGamessEcp(sink, record)));
}

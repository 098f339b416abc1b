/**
 * CP2K GTH pseudopotential files (GTH_POTENTIALS, POTENTIAL).
 *
 * Layout of one entry:
 *   Element  Name  Alias...
 *   n_elec(s)  n_elec(p)  n_elec(d) ...
 *   r_loc  nexp_ppl  cexp_ppl(1) ... cexp_ppl(nexp_ppl)
 *   [NLCC n_nlcc
 *    r_core  n_core  c_core(1) ... c_core(n_core)]     (n_nlcc lines)
 *   nprj
 *   r(1)  nprj_ppnl(1)  ((hprj_ppnl(1,i,j), j=i,nprj_ppnl(1)), i=1,nprj_ppnl(1))
 *   ...
 *
 * The h matrix rows may continue over several lines; each line after the
 * first holds the next row of the upper triangle.
 */

import {
  LineCursor,
  deriveIdentifiers,
  deriveValenceElectrons,
  splitCp2kBlocks,
  splitTokens,
  type LineSource,
  type SourceLine,
} from './lexer.js';
import { formatFloat, formatInt, renderToString, type FloatFormat, type TextSink } from './output.js';
import {
  filterRecords,
  triangularCount,
  triangularRowOffset,
  type GthNlccTerm,
  type GthProjector,
  type GthPseudopotentialRecord,
  type RecordFilter,
} from './records.js';
import { validateGthPseudopotential } from './schemas.js';

const FORMAT = 'CP2K pseudopotential';
const NLCC_MATCH = /^NLCC(\s|$)/i;

const FLOAT_WIDTH = 15;
const FLOAT: FloatFormat = { width: FLOAT_WIDTH, precision: 8 };
const INT_WIDTH = 5;
const PROJECTOR_INDENT = 20;

export interface Cp2kPseudoWriteOptions {
  comment?: string;
}

/** r, a declared count and that many coefficients on one line. */
function parseCountedTerm(cursor: LineCursor, line: SourceLine, what: string): { r: number; coeffs: number[] } {
  const [rToken, countToken, ...rest] = splitTokens(line.text);
  const r = cursor.float(rToken, line, `${what} radius`);
  const declared = cursor.int(countToken, line, `${what} count`);
  const coeffs = rest.map(token => cursor.float(token, line, `${what} coefficient`));
  if (declared !== coeffs.length) {
    throw cursor.invalid(`${what} declares ${declared} coefficient(s) but lists ${coeffs.length}`, line);
  }
  return { r, coeffs };
}

function parseProjector(cursor: LineCursor): GthProjector {
  const first = cursor.next('non-local projector');
  const [rToken, nprojToken, ...rest] = splitTokens(first.text);
  const r = cursor.float(rToken, first, 'projector radius');
  const nproj = cursor.int(nprojToken, first, 'projector count');
  if (nproj < 0) throw cursor.fail(`negative projector count ${nproj}`, first);

  const required = triangularCount(nproj);
  const coeffs = rest.map(token => cursor.float(token, first, 'projector coefficient'));

  while (coeffs.length < required) {
    const line = cursor.next(`projector coefficients (${required} expected, ${coeffs.length} read)`);
    coeffs.push(...cursor.floats(line, 'projector coefficient'));
  }

  if (coeffs.length > required) {
    throw cursor.fail(
      `unknown format: nprj_ppnl=${nproj} needs ${required} coefficients, found ${coeffs.length}`,
      first,
    );
  }

  return { r, nproj, coeffs };
}

export function parseSingleCp2kPseudopotential(lines: readonly SourceLine[]): GthPseudopotentialRecord {
  const cursor = new LineCursor(lines, { format: FORMAT });

  const header = cursor.next('header');
  const [element, ...identifiers] = splitTokens(header.text);
  if (element === undefined || identifiers.length === 0) {
    throw cursor.fail('header must hold an element symbol and at least one name', header);
  }
  const { name, aliases, tags } = deriveIdentifiers(identifiers);
  cursor.context = { format: FORMAT, block: `${element} ${name}` };

  const elLine = cursor.next('electron configuration');
  const n_el = cursor.ints(elLine, 'electron count');
  if (n_el.length === 0) throw cursor.fail('empty electron configuration', elLine);
  const n_val = deriveValenceElectrons(element, tags);
  const occupancy = n_el.reduce((sum, count) => sum + count, 0);
  if (n_val !== null && n_val !== occupancy) {
    throw cursor.invalid(`${n_val} valence electron(s) in the name but the channels hold ${occupancy}`, elLine);
  }

  const local = parseCountedTerm(cursor, cursor.next('local part'), 'local part');

  const nlcc: GthNlccTerm[] = [];
  const maybeNlcc = cursor.peek();
  if (maybeNlcc !== undefined && NLCC_MATCH.test(maybeNlcc.text)) {
    cursor.next('NLCC header');
    const [, countToken] = splitTokens(maybeNlcc.text);
    const nNlcc = cursor.int(countToken, maybeNlcc, 'NLCC term count');
    for (let i = 0; i < nNlcc; i++) {
      nlcc.push(parseCountedTerm(cursor, cursor.next('NLCC term'), 'NLCC term'));
    }
  }

  const nprjLine = cursor.next('number of non-local projectors');
  const nprjTokens = splitTokens(nprjLine.text);
  if (nprjTokens.length !== 1) {
    throw cursor.fail(`expected a single projector count, got "${nprjLine.text}"`, nprjLine);
  }
  const nprj = cursor.int(nprjTokens[0], nprjLine, 'number of non-local projectors');

  const non_local: GthProjector[] = [];
  for (let i = 0; i < nprj; i++) {
    non_local.push(parseProjector(cursor));
  }

  const trailing = cursor.peek();
  if (trailing !== undefined) {
    throw cursor.fail(`unexpected line after ${nprj} projector(s): "${trailing.text}"`, trailing);
  }

  return { kind: 'gth', element, name, aliases, tags, version: 1, n_el, local, non_local, nlcc };
}

export function* cp2kPseudopotentialIter(source: LineSource): Generator<GthPseudopotentialRecord> {
  for (const block of splitCp2kBlocks(source)) {
    yield parseSingleCp2kPseudopotential(block);
  }
}

export function parseCp2kPseudopotentials(source: LineSource, filter: RecordFilter = {}): GthPseudopotentialRecord[] {
  return [...filterRecords(cp2kPseudopotentialIter(source), filter)];
}

function formatCountedTerm(term: { r: number; coeffs: readonly number[] }): string {
  return formatFloat(term.r, FLOAT)
    + formatInt(term.coeffs.length, INT_WIDTH)
    + term.coeffs.map(c => formatFloat(c, FLOAT)).join('');
}

export function writeCp2kPseudopotential(
  sink: TextSink,
  record: GthPseudopotentialRecord,
  options: Cp2kPseudoWriteOptions = {},
): void {
  const pseudo = validateGthPseudopotential(record);

  if (options.comment !== undefined) sink.write(`# ${options.comment}\n`);

  const names = [pseudo.name, ...pseudo.aliases.filter(alias => alias !== pseudo.name)];
  sink.write(`${pseudo.element} ${names.join(' ')}\n`);
  sink.write(pseudo.n_el.map(n => formatInt(n, INT_WIDTH)).join('') + '\n');
  sink.write(formatCountedTerm(pseudo.local) + '\n');

  if (pseudo.nlcc.length > 0) {
    sink.write(`  NLCC${formatInt(pseudo.nlcc.length, INT_WIDTH)}\n`);
    for (const term of pseudo.nlcc) sink.write(formatCountedTerm(term) + '\n');
  }

  sink.write(formatInt(pseudo.non_local.length, INT_WIDTH) + '\n');

  for (const proj of pseudo.non_local) {
    // staircase: row i of the upper triangle starts under column i
    for (let i = 0; i < Math.max(proj.nproj, 1); i++) {
      const offset = triangularRowOffset(i, proj.nproj);
      const row = proj.coeffs.slice(offset, offset + proj.nproj - i);
      const lead = i === 0
        ? formatFloat(proj.r, FLOAT) + formatInt(proj.nproj, INT_WIDTH)
        : ' '.repeat(PROJECTOR_INDENT + FLOAT_WIDTH * i);
      sink.write(lead + row.map(c => formatFloat(c, FLOAT)).join('') + '\n');
    }
  }
}

export function formatCp2kPseudopotentials(
  records: readonly GthPseudopotentialRecord[],
  options: Cp2kPseudoWriteOptions = {},
): string {
  return renderToString(sink => {
    for (const record of records) writeCp2kPseudopotential(sink, record, options);
  });
}

/**
 * Format registry
 *
 * Every supported file format with the operations it implements. To add a
 * format: write its codec module, describe it with a FormatHandler below and
 * append it to `handlers`.
 */

import { invalidParams, unsupported } from '../shared/index.js';
import { parseCp2kBasisSets, writeCp2kBasisSet } from './cp2kBasisSet.js';
import { parseCp2kPseudopotentials, writeCp2kPseudopotential } from './cp2kPseudopotential.js';
import { parseGamessBasisSets, parseGamessPseudopotentials, writeGamessBasisSet, writeGamessEcp } from './gamess.js';
import {
  parseGaussianBasisSets,
  parseGaussianPseudopotentials,
  writeGaussianBasisSet,
  writeGaussianEcp,
} from './gaussian.js';
import type { LineSource } from './lexer.js';
import {
  parseNwchemBasisSets,
  parseNwchemPseudopotentials,
  writeNwchemBasisLibrary,
  writeNwchemEcpLibrary,
} from './nwchem.js';
import { renderToString, type FloatFormat, type TextSink } from './output.js';
import type {
  BasisSetRecord,
  EcpPseudopotentialRecord,
  GthPseudopotentialRecord,
  PseudopotentialRecord,
  RecordFilter,
} from './records.js';
import { writeTurborvbEcp } from './turborvb.js';

export const FORMAT_NAMES = ['cp2k', 'nwchem', 'gamess', 'gaussian', 'turborvb'] as const;
export type FormatName = (typeof FORMAT_NAMES)[number];

export interface ParseOptions extends RecordFilter {
  /** Record name for formats that carry none (NWChem, GAMESS, Gaussian basis sets; NWChem ECPs). */
  name?: string;
  /** GAMESS ECPs: element for entries whose name prefix is not an element symbol. */
  defaultElement?: string;
}

export interface WriteOptions {
  comment?: string;
  /** CP2K basis sets */
  exponentFormat?: FloatFormat;
  coefficientFormat?: FloatFormat;
  /** TurboRVB */
  tolerance?: number;
  fallbackCutoff?: number;
  index?: number;
}

export interface FormatHandler {
  name: FormatName;
  description: string;
  pseudopotentialKind?: PseudopotentialRecord['kind'];
  parseBasisSets?(source: LineSource, options: ParseOptions): BasisSetRecord[];
  writeBasisSets?(sink: TextSink, records: readonly BasisSetRecord[], options: WriteOptions): void;
  parsePseudopotentials?(source: LineSource, options: ParseOptions): PseudopotentialRecord[];
  writePseudopotentials?(sink: TextSink, records: readonly PseudopotentialRecord[], options: WriteOptions): void;
}

function requireGth(record: PseudopotentialRecord, format: FormatName): GthPseudopotentialRecord {
  if (record.kind !== 'gth') {
    throw unsupported(`${format} writes GTH pseudopotentials only; ${record.element} ${record.name} is an ECP`, {
      format,
      kind: record.kind,
    });
  }
  return record;
}

function requireEcp(record: PseudopotentialRecord, format: FormatName): EcpPseudopotentialRecord {
  if (record.kind !== 'ecp') {
    throw unsupported(`${format} writes ECPs only; ${record.element} ${record.name} is a GTH pseudopotential`, {
      format,
      kind: record.kind,
    });
  }
  return record;
}

export const cp2kHandler: FormatHandler = {
  name: 'cp2k',
  description: 'CP2K BASIS_SET / GTH_POTENTIALS library files',
  pseudopotentialKind: 'gth',
  parseBasisSets: (source, options) => parseCp2kBasisSets(source, options),
  writeBasisSets: (sink, records, options) => {
    for (const record of records) writeCp2kBasisSet(sink, record, options);
  },
  parsePseudopotentials: (source, options) => parseCp2kPseudopotentials(source, options),
  writePseudopotentials: (sink, records, options) => {
    for (const record of records) writeCp2kPseudopotential(sink, requireGth(record, 'cp2k'), options);
  },
};

export const nwchemHandler: FormatHandler = {
  name: 'nwchem',
  description: 'NWChem BASIS and ECP input blocks',
  pseudopotentialKind: 'ecp',
  parseBasisSets: (source, options) => parseNwchemBasisSets(source, options),
  writeBasisSets: (sink, records) => writeNwchemBasisLibrary(sink, records),
  parsePseudopotentials: (source, options) => parseNwchemPseudopotentials(source, options),
  writePseudopotentials: (sink, records) => {
    writeNwchemEcpLibrary(sink, records.map(record => requireEcp(record, 'nwchem')));
  },
};

export const gamessHandler: FormatHandler = {
  name: 'gamess',
  description: 'GAMESS $DATA basis sets and $ECP potentials',
  pseudopotentialKind: 'ecp',
  parseBasisSets: (source, options) => parseGamessBasisSets(source, options),
  writeBasisSets: (sink, records) => {
    for (const record of records) writeGamessBasisSet(sink, record);
  },
  parsePseudopotentials: (source, options) => parseGamessPseudopotentials(source, options),
  writePseudopotentials: (sink, records) => {
    for (const record of records) writeGamessEcp(sink, requireEcp(record, 'gamess'));
  },
};

export const gaussianHandler: FormatHandler = {
  name: 'gaussian',
  description: 'Gaussian94 basis sets and ECPs',
  pseudopotentialKind: 'ecp',
  parseBasisSets: (source, options) => parseGaussianBasisSets(source, options),
  writeBasisSets: (sink, records) => {
    for (const record of records) writeGaussianBasisSet(sink, record);
  },
  parsePseudopotentials: (source, options) => parseGaussianPseudopotentials(source, options),
  writePseudopotentials: (sink, records) => {
    for (const record of records) writeGaussianEcp(sink, requireEcp(record, 'gaussian'));
  },
};

export const turborvbHandler: FormatHandler = {
  name: 'turborvb',
  description: 'TurboRVB pseudo.dat ECP tables (write only)',
  pseudopotentialKind: 'ecp',
  writePseudopotentials: (sink, records, options) => {
    for (const record of records) writeTurborvbEcp(sink, requireEcp(record, 'turborvb'), options);
  },
};

const handlers: FormatHandler[] = [cp2kHandler, nwchemHandler, gamessHandler, gaussianHandler, turborvbHandler];

export const getHandlers = (): readonly FormatHandler[] => handlers;

export function isFormatName(value: string): value is FormatName {
  return FORMAT_NAMES.some(name => name === value);
}

export function getHandler(format: string): FormatHandler {
  const handler = handlers.find(h => h.name === format);
  if (!handler) {
    throw invalidParams(`Unknown format: ${format}`, { format, supported: [...FORMAT_NAMES] });
  }
  return handler;
}

export interface FormatCapabilities {
  format: FormatName;
  description: string;
  parse_basis_sets: boolean;
  write_basis_sets: boolean;
  parse_pseudopotentials: boolean;
  write_pseudopotentials: boolean;
  pseudopotential_kind: PseudopotentialRecord['kind'] | null;
}

export function listFormats(): FormatCapabilities[] {
  return handlers.map(h => ({
    format: h.name,
    description: h.description,
    parse_basis_sets: h.parseBasisSets !== undefined,
    write_basis_sets: h.writeBasisSets !== undefined,
    parse_pseudopotentials: h.parsePseudopotentials !== undefined,
    write_pseudopotentials: h.writePseudopotentials !== undefined,
    pseudopotential_kind: h.pseudopotentialKind ?? null,
  }));
}

function missing(format: string, operation: string): never {
  throw unsupported(`${format} does not support ${operation}`, { format, operation });
}

export function parseBasisSets(format: string, source: LineSource, options: ParseOptions = {}): BasisSetRecord[] {
  const handler = getHandler(format);
  if (!handler.parseBasisSets) return missing(format, 'parsing basis sets');
  return handler.parseBasisSets(source, options);
}

export function writeBasisSets(
  format: string,
  sink: TextSink,
  records: readonly BasisSetRecord[],
  options: WriteOptions = {},
): void {
  const handler = getHandler(format);
  if (!handler.writeBasisSets) return missing(format, 'writing basis sets');
  handler.writeBasisSets(sink, records, options);
}

export function parsePseudopotentials(
  format: string,
  source: LineSource,
  options: ParseOptions = {},
): PseudopotentialRecord[] {
  const handler = getHandler(format);
  if (!handler.parsePseudopotentials) return missing(format, 'parsing pseudopotentials');
  return handler.parsePseudopotentials(source, options);
}

export function writePseudopotentials(
  format: string,
  sink: TextSink,
  records: readonly PseudopotentialRecord[],
  options: WriteOptions = {},
): void {
  const handler = getHandler(format);
  if (!handler.writePseudopotentials) return missing(format, 'writing pseudopotentials');
  handler.writePseudopotentials(sink, records, options);
}

export const formatBasisSets = (format: string, records: readonly BasisSetRecord[], options: WriteOptions = {}): string =>
  renderToString(sink => writeBasisSets(format, sink, records, options));

export const formatPseudopotentials = (
  format: string,
  records: readonly PseudopotentialRecord[],
  options: WriteOptions = {},
): string => renderToString(sink => writePseudopotentials(format, sink, records, options));

export * from './basisOps.js';
export * from './cp2kBasisSet.js';
export * from './cp2kPseudopotential.js';
export * from './ecp.js';
export * from './elements.js';
export * from './gamess.js';
export * from './gaussian.js';
export * from './lexer.js';
export * from './nwchem.js';
export * from './output.js';
export * from './records.js';
export * from './schemas.js';
export * from './turborvb.js';

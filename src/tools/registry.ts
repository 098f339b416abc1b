import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { loadSource, nameFromSource, type SourceParams } from './sources.js';
import {
  BasisSetRecordSchema,
  FORMAT_NAMES,
  PseudopotentialRecordSchema,
  countOrbitalFunctions,
  formatBasisSets,
  formatPseudopotentials,
  listFormats,
  mergeBlocks,
  parseBasisSets,
  parsePseudopotentials,
  shellSummary,
  uncontractBasisSet,
  type BasisSetRecord,
  type ParseOptions,
  type WriteOptions,
} from '../formats/index.js';
import {
  GTO_LIST_FORMATS,
  GTO_PARSE_BASIS_SETS,
  GTO_PARSE_PSEUDOPOTENTIALS,
  GTO_WRITE_BASIS_SETS,
  GTO_WRITE_PSEUDOPOTENTIALS,
  GTO_CONVERT_BASIS_SETS,
  GTO_CONVERT_PSEUDOPOTENTIALS,
  GTO_DESCRIBE_BASIS_SET,
  GTO_UNCONTRACT_BASIS_SET,
  type GtoToolName,
} from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {
  /** Base directory for relative `path` arguments (GTO_DATA_DIR). */
  dataDir?: string;
}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: GtoToolName;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const FormatSchema = z.enum(FORMAT_NAMES);

const sourceShape = {
  content: z.string().optional().describe('File contents'),
  path: z.string().min(1).optional().describe('File path; relative paths resolve against GTO_DATA_DIR'),
};

const filterShape = {
  element: z.string().min(1).max(3).optional().describe('Keep only entries for this element symbol (e.g. "He")'),
  tags: z.array(z.string().min(1)).optional().describe('Keep only entries carrying every tag (e.g. ["PBE"])'),
};

const parseShape = {
  ...sourceShape,
  ...filterShape,
  name: z.string().min(1).optional()
    .describe('Record name for formats that carry none (NWChem, GAMESS, Gaussian basis sets; NWChem ECPs)'),
};

const exactlyOneSource = (v: SourceParams): boolean => (v.content === undefined) !== (v.path === undefined);
const exactlyOneSourceMessage = { message: 'Exactly one of content or path must be provided' };

const GtoListFormatsSchema = z.object({});

const GtoParseBasisSetsSchema = z.object({
  format: FormatSchema.describe('Input format'),
  ...parseShape,
}).refine(exactlyOneSource, exactlyOneSourceMessage);

const GtoParsePseudopotentialsSchema = z.object({
  format: FormatSchema.describe('Input format'),
  ...parseShape,
  default_element: z.string().min(1).optional()
    .describe('GAMESS: element for entries whose name prefix is not an element symbol'),
}).refine(exactlyOneSource, exactlyOneSourceMessage);

const GtoWriteBasisSetsSchema = z.object({
  format: FormatSchema.describe('Output format'),
  records: z.array(BasisSetRecordSchema).describe('Basis set records'),
  comment: z.string().optional().describe('CP2K: text of the leading comment line'),
});

const turborvbShape = {
  tolerance: z.number().positive().optional().describe('TurboRVB: |V(r)| threshold for the cutoff radius (default 1e-5)'),
  fallback_cutoff: z.number().positive().optional()
    .describe('TurboRVB: cutoff radius to use when no grid point exceeds the tolerance'),
  index: z.number().int().min(1).optional().describe('TurboRVB: atom index on the header line (default 1)'),
};

const GtoWritePseudopotentialsSchema = z.object({
  format: FormatSchema.describe('Output format'),
  records: z.array(PseudopotentialRecordSchema).describe('Pseudopotential records (GTH or ECP)'),
  comment: z.string().optional().describe('CP2K: comment line written before each entry'),
  ...turborvbShape,
});

const GtoConvertBasisSetsSchema = z.object({
  from: FormatSchema.describe('Input format'),
  to: FormatSchema.describe('Output format'),
  ...parseShape,
  merge: z.boolean().optional().default(false)
    .describe('Merge consecutive blocks that share exponents before writing'),
  comment: z.string().optional(),
}).refine(exactlyOneSource, exactlyOneSourceMessage);

const GtoConvertPseudopotentialsSchema = z.object({
  from: FormatSchema.describe('Input format'),
  to: FormatSchema.describe('Output format'),
  ...parseShape,
  default_element: z.string().min(1).optional(),
  comment: z.string().optional(),
  ...turborvbShape,
}).refine(exactlyOneSource, exactlyOneSourceMessage);

const GtoBasisSetRecordSchema = z.object({
  record: BasisSetRecordSchema.describe('Basis set record'),
});

// ── Helpers ───────────────────────────────────────────────────────────────

function parseOptionsOf(
  params: { element?: string; tags?: string[]; name?: string; default_element?: string },
  fileName: string | undefined,
): ParseOptions {
  return {
    element: params.element,
    tags: params.tags,
    name: params.name ?? fileName,
    defaultElement: params.default_element,
  };
}

function writeOptionsOf(params: {
  comment?: string;
  tolerance?: number;
  fallback_cutoff?: number;
  index?: number;
}): WriteOptions {
  return {
    comment: params.comment,
    tolerance: params.tolerance,
    fallbackCutoff: params.fallback_cutoff,
    index: params.index,
  };
}

function describeBasisSet(record: BasisSetRecord) {
  const { blocks } = record;
  return {
    element: record.element,
    name: record.name,
    aliases: record.aliases,
    tags: record.tags,
    n_el: record.n_el,
    version: record.version,
    block_count: blocks.length,
    primitive_count: blocks.reduce((sum, block) => sum + block.coefficients.length, 0),
    orbital_functions: countOrbitalFunctions(blocks),
    shells: shellSummary(blocks),
  };
}

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: GTO_LIST_FORMATS,
    description: 'List supported file formats and which parse/write operations each implements.',
    exposure: 'standard',
    zodSchema: GtoListFormatsSchema,
    handler: async () => ({ formats: listFormats() }),
  }),
  defineTool({
    name: GTO_PARSE_BASIS_SETS,
    description: 'Parse a basis set file (CP2K, NWChem, GAMESS, Gaussian94) into structured records. Optionally filter by element and tags.',
    exposure: 'standard',
    zodSchema: GtoParseBasisSetsSchema,
    handler: async (params, ctx) => {
      const source = await loadSource(params, ctx.dataDir);
      const records = parseBasisSets(params.format, source.text, parseOptionsOf(params, nameFromSource(source)));
      return { format: params.format, count: records.length, records };
    },
  }),
  defineTool({
    name: GTO_PARSE_PSEUDOPOTENTIALS,
    description: 'Parse a pseudopotential file into records: GTH potentials from CP2K, ECPs from NWChem, GAMESS and Gaussian.',
    exposure: 'standard',
    zodSchema: GtoParsePseudopotentialsSchema,
    handler: async (params, ctx) => {
      const source = await loadSource(params, ctx.dataDir);
      const records = parsePseudopotentials(params.format, source.text, parseOptionsOf(params, nameFromSource(source)));
      return { format: params.format, count: records.length, records };
    },
  }),
  defineTool({
    name: GTO_WRITE_BASIS_SETS,
    description: 'Write basis set records in the given format. Records are validated first.',
    exposure: 'standard',
    zodSchema: GtoWriteBasisSetsSchema,
    handler: async (params) => ({
      format: params.format,
      count: params.records.length,
      text: formatBasisSets(params.format, params.records, writeOptionsOf(params)),
    }),
  }),
  defineTool({
    name: GTO_WRITE_PSEUDOPOTENTIALS,
    description: 'Write pseudopotential records in the given format. CP2K takes GTH records; NWChem, GAMESS, Gaussian and TurboRVB take ECPs.',
    exposure: 'standard',
    zodSchema: GtoWritePseudopotentialsSchema,
    handler: async (params) => ({
      format: params.format,
      count: params.records.length,
      text: formatPseudopotentials(params.format, params.records, writeOptionsOf(params)),
    }),
  }),
  defineTool({
    name: GTO_CONVERT_BASIS_SETS,
    description: 'Convert a basis set file between formats (parse with `from`, write with `to`).',
    exposure: 'standard',
    zodSchema: GtoConvertBasisSetsSchema,
    handler: async (params, ctx) => {
      const source = await loadSource(params, ctx.dataDir);
      const parsed = parseBasisSets(params.from, source.text, parseOptionsOf(params, nameFromSource(source)));
      const records = params.merge
        ? parsed.map(record => ({ ...record, blocks: mergeBlocks(record.blocks) }))
        : parsed;
      return {
        from: params.from,
        to: params.to,
        count: records.length,
        text: formatBasisSets(params.to, records, writeOptionsOf(params)),
      };
    },
  }),
  defineTool({
    name: GTO_CONVERT_PSEUDOPOTENTIALS,
    description: 'Convert a pseudopotential file between formats. GTH potentials only convert to CP2K; ECPs convert between NWChem, GAMESS, Gaussian and TurboRVB.',
    exposure: 'standard',
    zodSchema: GtoConvertPseudopotentialsSchema,
    handler: async (params, ctx) => {
      const source = await loadSource(params, ctx.dataDir);
      const records = parsePseudopotentials(params.from, source.text, parseOptionsOf(params, nameFromSource(source)));
      return {
        from: params.from,
        to: params.to,
        count: records.length,
        text: formatPseudopotentials(params.to, records, writeOptionsOf(params)),
      };
    },
  }),
  defineTool({
    name: GTO_DESCRIBE_BASIS_SET,
    description: 'Summarize a basis set record: valence electrons, block and primitive counts, orbital function count, shell summary (e.g. "2s1p").',
    exposure: 'standard',
    zodSchema: GtoBasisSetRecordSchema,
    handler: async (params) => describeBasisSet(params.record),
  }),
  defineTool({
    name: GTO_UNCONTRACT_BASIS_SET,
    description: 'Uncontract a basis set: one block per primitive with coefficient 1.0; the name gets a "-uncont" suffix.',
    exposure: 'full',
    zodSchema: GtoBasisSetRecordSchema,
    handler: async (params) => uncontractBasisSet(params.record),
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}

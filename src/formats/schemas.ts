/**
 * zod schemas for the canonical records. They carry the cross-field
 * invariants (row lengths, declared counts, triangular packing) so a record
 * arriving from outside the parsers is checked before it is written.
 */

import { z } from 'zod';
import { validationError } from '../shared/index.js';
import {
  triangularCount,
  type BasisSetRecord,
  type EcpPseudopotentialRecord,
  type GthPseudopotentialRecord,
  type PseudopotentialRecord,
} from './records.js';

const finite = z.number().finite();
const count = z.number().int().min(0);

const identity = {
  element: z.string().min(1).max(3),
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)),
  tags: z.array(z.string()),
  version: z.number().int().min(1).default(1),
};

export const BasisSetBlockSchema = z.object({
  n: count,
  l: z.array(z.tuple([count, count])).min(1),
  coefficients: z.array(z.array(finite).min(2)).min(1),
}).superRefine((block, ctx) => {
  const ls = block.l.map(([l]) => l);
  for (let i = 1; i < ls.length; i++) {
    if (ls[i] !== (ls[i - 1] ?? 0) + 1) {
      ctx.addIssue({ code: 'custom', message: 'angular momenta must be contiguous and ascending', path: ['l'] });
      break;
    }
  }
  const width = 1 + block.l.reduce((sum, [, n]) => sum + n, 0);
  block.coefficients.forEach((row, i) => {
    if (row.length !== width) {
      ctx.addIssue({
        code: 'custom',
        message: `row has ${row.length} values, expected ${width} (exponent + one per shell)`,
        path: ['coefficients', i],
      });
    }
  });
});

export const BasisSetRecordSchema: z.ZodType<BasisSetRecord> = z.object({
  ...identity,
  n_el: count.nullable(),
  blocks: z.array(BasisSetBlockSchema),
});

export const GthProjectorSchema = z.object({
  r: finite,
  nproj: count,
  coeffs: z.array(finite),
}).superRefine((proj, ctx) => {
  const expected = triangularCount(proj.nproj);
  if (proj.coeffs.length !== expected) {
    ctx.addIssue({
      code: 'custom',
      message: `nproj=${proj.nproj} needs ${expected} upper-triangular coefficients, got ${proj.coeffs.length}`,
      path: ['coeffs'],
    });
  }
});

export const GthPseudopotentialRecordSchema: z.ZodType<GthPseudopotentialRecord> = z.object({
  kind: z.literal('gth'),
  ...identity,
  n_el: z.array(count).min(1),
  local: z.object({ r: finite, coeffs: z.array(finite) }),
  non_local: z.array(GthProjectorSchema),
  nlcc: z.array(z.object({ r: finite, coeffs: z.array(finite) })).default([]),
});

export const EcpFunctionSchema = z.object({
  prefactors: z.array(finite),
  polynoms: z.array(z.number().int()),
  exponents: z.array(finite),
}).superRefine((fn, ctx) => {
  if (fn.polynoms.length !== fn.prefactors.length || fn.exponents.length !== fn.prefactors.length) {
    ctx.addIssue({ code: 'custom', message: 'prefactors, polynoms and exponents must have equal length' });
  }
});

export const EcpPseudopotentialRecordSchema: z.ZodType<EcpPseudopotentialRecord> = z.object({
  kind: z.literal('ecp'),
  ...identity,
  core_electrons: count,
  lmax: count,
  n_el_tot: z.number().int().nullable(),
  functions: z.array(EcpFunctionSchema),
}).superRefine((ecp, ctx) => {
  if (ecp.functions.length !== ecp.lmax + 1) {
    ctx.addIssue({
      code: 'custom',
      message: `lmax=${ecp.lmax} needs ${ecp.lmax + 1} channels, got ${ecp.functions.length}`,
      path: ['functions'],
    });
  }
});

export const PseudopotentialRecordSchema: z.ZodType<PseudopotentialRecord> = z.union([
  GthPseudopotentialRecordSchema,
  EcpPseudopotentialRecordSchema,
]);

function validateWith<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const summary = result.error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  throw validationError(`Invalid ${what}: ${summary}`, { issues: result.error.issues });
}

export function validateBasisSet(value: unknown): BasisSetRecord {
  return validateWith(BasisSetRecordSchema, value, 'basis set');
}

export function validatePseudopotential(value: unknown): PseudopotentialRecord {
  return validateWith(PseudopotentialRecordSchema, value, 'pseudopotential');
}

export function validateGthPseudopotential(value: unknown): GthPseudopotentialRecord {
  return validateWith(GthPseudopotentialRecordSchema, value, 'GTH pseudopotential');
}

export function validateEcpPseudopotential(value: unknown): EcpPseudopotentialRecord {
  return validateWith(EcpPseudopotentialRecordSchema, value, 'ECP pseudopotential');
}

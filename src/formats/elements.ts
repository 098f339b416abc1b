/**
 * Periodic table lookup shared by every codec.
 *
 * Loaded once from data/elements.json and read-only afterwards.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const ElementTableSchema = z.array(z.object({
  Z: z.number().int().min(1),
  symbol: z.string().min(1).max(3),
  name: z.string().min(1),
}));

export type ElementEntry = z.infer<typeof ElementTableSchema>[number];

const ELEMENTS_PATH = fileURLToPath(new URL('../../data/elements.json', import.meta.url));

const ELEMENTS: readonly ElementEntry[] = ElementTableSchema.parse(
  JSON.parse(fs.readFileSync(ELEMENTS_PATH, 'utf-8'))
);

const BY_SYMBOL = new Map(ELEMENTS.map(e => [e.symbol, e]));
const BY_Z = new Map(ELEMENTS.map(e => [e.Z, e]));
const BY_LOWER = new Map<string, ElementEntry>();
for (const e of ELEMENTS) {
  BY_LOWER.set(e.symbol.toLowerCase(), e);
  BY_LOWER.set(e.name.toLowerCase(), e);
}
// GAMESS and older US-written files spell these differently
for (const [alias, canonical] of [['aluminum', 'aluminium'], ['cesium', 'caesium']] as const) {
  const entry = BY_LOWER.get(canonical);
  if (entry) BY_LOWER.set(alias, entry);
}

/** Atomic number for an exact (case-sensitive) element symbol. */
export function atomicNumber(symbol: string): number | undefined {
  return BY_SYMBOL.get(symbol)?.Z;
}

export function elementSymbol(Z: number): string | undefined {
  return BY_Z.get(Z)?.symbol;
}

export function elementName(symbol: string): string | undefined {
  return BY_SYMBOL.get(symbol)?.name;
}

/**
 * Resolve a symbol or full English name, in any case ("he", "HE", "HELIUM").
 */
export function resolveElement(symbolOrName: string): ElementEntry | undefined {
  return BY_LOWER.get(symbolOrName.trim().toLowerCase());
}

export function isElementSymbol(symbol: string): boolean {
  return BY_SYMBOL.has(symbol);
}

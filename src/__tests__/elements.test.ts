import { describe, it, expect } from 'vitest';
import { atomicNumber, elementName, elementSymbol, isElementSymbol, resolveElement } from '../formats/elements.js';

describe('element table', () => {
  it('maps symbols to atomic numbers and back', () => {
    expect(atomicNumber('H')).toBe(1);
    expect(atomicNumber('Og')).toBe(118);
    expect(atomicNumber('he')).toBeUndefined();
    expect(elementSymbol(26)).toBe('Fe');
    expect(elementSymbol(0)).toBeUndefined();
  });

  it('knows English names', () => {
    expect(elementName('Na')).toBe('Sodium');
    expect(elementName('Xx')).toBeUndefined();
  });

  it('resolves symbols and names in any case', () => {
    expect(resolveElement('HE')?.symbol).toBe('He');
    expect(resolveElement('hydrogen')?.Z).toBe(1);
    expect(resolveElement('ALUMINUM')?.symbol).toBe('Al');
    expect(resolveElement('Cesium')?.symbol).toBe('Cs');
    expect(resolveElement('unobtainium')).toBeUndefined();
  });

  it('checks symbols case-sensitively', () => {
    expect(isElementSymbol('Cl')).toBe(true);
    expect(isElementSymbol('CL')).toBe(false);
  });
});

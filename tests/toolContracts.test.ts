import { describe, it, expect } from 'vitest';
import { TOOL_SPECS, getTools } from '../src/tools/registry.js';

describe('GTO MCP tool contracts', () => {
  it('all tools have valid names', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.name).toMatch(/^gto_[a-z_]+$/);
    }
  });

  it('all tools have descriptions', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it('getTools returns valid MCP tool definitions', () => {
    const tools = getTools('full');
    expect(tools.length).toBe(TOOL_SPECS.length);
    for (const tool of tools) {
      expect(tool.name).toBeDefined();
      expect(tool.description).toBeDefined();
      expect(tool.inputSchema.type).toBe('object');
    }
  });

  it('all tool names are unique', () => {
    const names = TOOL_SPECS.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('parse tools declare format, content and path', () => {
    const tool = getTools('standard').find(t => t.name === 'gto_parse_basis_sets');
    const properties = tool?.inputSchema.properties;
    if (typeof properties !== 'object' || properties === null) throw new Error('inputSchema has no properties');
    expect(Object.keys(properties)).toEqual(
      expect.arrayContaining(['format', 'content', 'path', 'element', 'tags', 'name']),
    );
    expect(tool?.inputSchema.required).toEqual(['format']);
  });

  it('uncontract is only exposed in full mode', () => {
    expect(getTools('standard').some(t => t.name === 'gto_uncontract_basis_set')).toBe(false);
    expect(getTools('full').some(t => t.name === 'gto_uncontract_basis_set')).toBe(true);
  });

  it('expected tool count', () => {
    expect(TOOL_SPECS.length).toBe(9);
  });

  it('expected standard-mode tool count', () => {
    expect(getTools('standard').length).toBe(8);
  });
});

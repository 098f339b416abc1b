import { ZodError } from 'zod';
import { CodecError, invalidParams } from '../shared/index.js';
import type { ToolExposureMode } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';
import { resolveDataDirFromEnv } from './sources.js';

export interface ToolCallContext {
  /** Overrides GTO_DATA_DIR. */
  dataDir?: string;
}

function parseToolArgs<T>(toolName: string, schema: { parse: (input: unknown) => T }, args: unknown): T {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

function formatToolError(err: unknown): { content: { type: 'text'; text: string }[]; isError: true } {
  const payload = (() => {
    if (err instanceof CodecError) {
      return {
        error: {
          code: err.code,
          message: err.message,
          ...(err.data && Object.keys(err.data).length > 0 ? { data: err.data } : {}),
        },
      };
    }

    const message = err instanceof Error ? err.message : String(err);
    return {
      error: {
        code: 'INTERNAL_ERROR',
        message,
      },
    };
  })();

  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
  ctx: ToolCallContext = {}
): Promise<{ content: { type: 'text'; text: string }[]; isError?: boolean }> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const parsedArgs = parseToolArgs(name, spec.zodSchema, args);
    const dataDir = ctx.dataDir ?? resolveDataDirFromEnv();
    const result = await spec.handler(parsedArgs, { dataDir });
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}

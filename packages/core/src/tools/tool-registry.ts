import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { ConfigurationError } from '@market-agent/shared/src/utils/errors.js';
import type {
  ToolCallRequest,
  ToolCallResult,
  ToolDeclaration,
} from '@market-agent/shared/src/types/tool.types.js';

const log = createChildLogger('tools:registry');

export interface ToolDefinition<S extends z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly schema: S;
  execute(args: z.output<S>): Promise<unknown>;
}

type ToolRun =
  | { readonly ok: true; readonly result: unknown }
  | { readonly ok: false; readonly error: string };

/** A tool with its input type erased behind schema validation. */
export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
  run(args: Record<string, unknown>): Promise<ToolRun>;
}

export interface ToolRegistry {
  readonly names: readonly string[];
  declarations(): ToolDeclaration[];
  invoke(call: ToolCallRequest): Promise<ToolCallResult>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  const jsonSchema = zodToJsonSchema(definition.schema, { $refStrategy: 'none' }) as Record<
    string,
    unknown
  >;
  const { $schema: _draft, ...parameters } = jsonSchema;

  return {
    name: definition.name,
    description: definition.description,
    parameters,
    async run(args: Record<string, unknown>): Promise<ToolRun> {
      const parsed = definition.schema.safeParse(args);
      if (!parsed.success) {
        return { ok: false, error: `Invalid arguments: ${formatIssues(parsed.error)}` };
      }

      try {
        const result = await definition.execute(parsed.data);
        return { ok: true, result };
      } catch (error) {
        return { ok: false, error: error instanceof Error ? error.message : String(error) };
      }
    },
  };
}

function parseArguments(
  raw: unknown,
): { readonly ok: true; readonly args: Record<string, unknown> } | { readonly ok: false; readonly error: string } {
  if (raw === undefined || raw === null || raw === '') {
    return { ok: true, args: {} };
  }

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw) as unknown;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: `Invalid JSON arguments: ${message}` };
    }
  }

  if (!isRecord(value)) {
    return { ok: false, error: 'Tool arguments must be a JSON object' };
  }
  return { ok: true, args: value };
}

export function createToolRegistry(tools: readonly RegisteredTool[]): ToolRegistry {
  const byName = new Map<string, RegisteredTool>();
  for (const tool of tools) {
    if (byName.has(tool.name)) {
      throw new ConfigurationError(`Duplicate tool name: ${tool.name}`);
    }
    byName.set(tool.name, tool);
  }

  return {
    names: [...byName.keys()],

    declarations(): ToolDeclaration[] {
      return [...byName.values()].map((tool) => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
    },

    async invoke(call: ToolCallRequest): Promise<ToolCallResult> {
      const parsedArgs = parseArguments(call.arguments);
      const args = parsedArgs.ok ? parsedArgs.args : {};

      const fail = (message: string): ToolCallResult => {
        log.warn({ tool: call.name, error: message }, 'Tool call failed');
        return { toolCallId: call.id, toolName: call.name, args, result: message, success: false };
      };

      if (!parsedArgs.ok) {
        return fail(parsedArgs.error);
      }

      const tool = byName.get(call.name);
      if (!tool) {
        return fail(`Unknown tool: ${call.name}`);
      }

      log.info({ tool: call.name, args }, 'Executing tool');
      const run = await tool.run(args);
      if (!run.ok) {
        return fail(run.error);
      }

      return { toolCallId: call.id, toolName: call.name, args, result: run.result, success: true };
    },
  };
}

import { z, toJSONSchema } from 'zod';

const DROPPED_KEYS = new Set(['$schema', '$defs', '~standard']);

export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema = toJSONSchema(schema, { io: 'input', unrepresentable: 'any' });

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(jsonSchema)) {
    if (!DROPPED_KEYS.has(key)) normalized[key] = value;
  }

  const type = normalized.type;
  if (type === undefined) {
    normalized.type = 'object';
    return normalized;
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }

  return normalized;
}

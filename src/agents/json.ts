import type { z } from 'zod';
import { AgentOutputError } from './errors';

/** Strip a surrounding code fence and cut the outermost `{...}` out of model output. */
export function extractJsonObject(text: string): string {
  const trimmed = text.trim();

  const fenceMatch = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const unfenced = fenceMatch?.[1] ? fenceMatch[1].trim() : trimmed;

  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) {
    return unfenced;
  }
  return unfenced.slice(start, end + 1);
}

export function parseModelJson<T>(agent: string, text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(text));
  } catch (err) {
    throw new AgentOutputError(agent, 'failed to parse model JSON output', text, err);
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    throw new AgentOutputError(agent, `invalid output schema: ${validated.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join(', ')}`, text);
  }
  return validated.data;
}

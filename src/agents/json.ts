import type { z } from 'zod';
import { RetryableAgentFailure } from './errors';

/** Pull the JSON object out of a model reply, tolerating code fences and chatter */
export function extractJsonObject(text: string): string {
  const trimmed = text.trim();

  // Remove fenced code blocks if the model included them.
  const fenceMatch = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const unfenced = fenceMatch?.[1] ? fenceMatch[1].trim() : trimmed;

  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');

  if (start === -1 || end === -1 || end <= start) {
    return unfenced;
  }

  return unfenced.slice(start, end + 1);
}

/**
 * Parse and validate a structured model reply.
 * @throws RetryableAgentFailure when the reply is not JSON or does not match the schema
 */
export function parseModelJson<T extends z.ZodTypeAny>(label: string, text: string, schema: T): z.infer<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(text));
  } catch (err) {
    throw new RetryableAgentFailure(`${label}: failed to parse model JSON output`, { cause: err });
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new RetryableAgentFailure(`${label}: invalid output schema: ${issues}`);
  }

  return validated.data;
}

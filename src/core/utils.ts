/**
 * @file Core utility functions shared across the project.
 */

const MAX_LLM_ID_LENGTH = 64;

/**
 * Sanitizes an identifier (an agent name, a tool name, a parameter name) so it can be
 * sent to a model provider as a function or parameter name.
 *
 * Characters outside `a-z A-Z 0-9 _ -` become underscores and the result is capped at
 * 64 characters, the limit OpenAI-compatible endpoints enforce for tool names.
 */
export function sanitizeIdForLLM(id: string): string {
  if (!id || id.trim() === '') {
    return 'unnamed_id';
  }

  let sanitized = id.replace(/[^a-zA-Z0-9_-]/g, '_');

  if (sanitized.length > MAX_LLM_ID_LENGTH) {
    sanitized = sanitized.substring(0, MAX_LLM_ID_LENGTH);
    // Drop a trailing underscore that only exists because a character was replaced.
    if (sanitized.endsWith('_') && id.charAt(MAX_LLM_ID_LENGTH - 1) !== '_') {
      sanitized = sanitized.substring(0, MAX_LLM_ID_LENGTH - 1);
    }
  }

  return sanitized.length > 0 ? sanitized : 'sanitized_id_empty';
}

/**
 * Renders a secret for log output. Only its presence is revealed, never any of its characters.
 */
export function maskSecret(secret: string | undefined): string {
  return secret ? '***' : '(none)';
}

/**
 * True for non-null, non-array objects, such as parsed JSON objects.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

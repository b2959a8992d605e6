/**
 * Extracts a JSON object from text that may contain other content, such as
 * prose or a fenced code block around a model's answer.
 *
 * @param context - Label for error messages (e.g. `diagnosis`, `patch`)
 * @throws Error if no parseable object is found
 */
export function extractJsonObject(text: string, context?: string): unknown {
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');

  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    const contextStr = context ? ` in ${context} response` : '';
    throw new Error(`No JSON object found${contextStr}.`);
  }

  const jsonText = text.slice(firstBrace, lastBrace + 1);

  try {
    const parsed: unknown = JSON.parse(jsonText);
    return parsed;
  } catch (e) {
    const contextStr = context ? ` from ${context} response` : '';
    throw new Error(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}

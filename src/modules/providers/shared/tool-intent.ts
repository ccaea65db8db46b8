/**
 * Phrases in the latest turn that make the mock answer with a tool call
 */
export const TOOL_TRIGGERS: readonly string[] = [
  'weather',
  'search',
  'calculate',
  'what is',
  'find',
];

export const UNKNOWN_ARGUMENT = 'unknown';

const EDGE_NON_ALPHANUMERIC = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * True when at least one tool is declared and the text mentions a trigger
 */
export function shouldInvokeTool(
  text: string | undefined,
  declaredTools: number,
): boolean {
  if (declaredTools <= 0 || text === undefined) {
    return false;
  }
  const lower = text.toLowerCase();
  return TOOL_TRIGGERS.some((trigger) => lower.includes(trigger));
}

/**
 * Last word longer than two characters, stripped of surrounding punctuation.
 * "What is the weather in Paris?" gives "Paris".
 */
export function extractToolArgument(text: string | undefined): string {
  if (text === undefined) {
    return UNKNOWN_ARGUMENT;
  }

  const candidates = text.split(/\s+/).filter((word) => word.length > 2);
  const last = candidates[candidates.length - 1];
  if (last === undefined) {
    return UNKNOWN_ARGUMENT;
  }

  const trimmed = last.replace(EDGE_NON_ALPHANUMERIC, '');
  return trimmed || UNKNOWN_ARGUMENT;
}

export interface ToolArguments {
  location: string;
}

/**
 * Arguments object for the synthetic tool call
 */
export function toolArguments(text: string | undefined): ToolArguments {
  return { location: extractToolArgument(text) };
}

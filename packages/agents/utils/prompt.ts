// Prompt text helpers shared by all agents

/** Keeps the head of `text` within `budget` characters and marks what was cut. */
export function truncate(text: string, budget: number): string {
  if (text.length <= budget) return text;
  const dropped = text.length - budget;
  return `${text.slice(0, budget)}\n[... truncated ${dropped} characters]`;
}

export const CONTEXT_CHAR_CAP = 6000;

/** Pretty-printed JSON of an upstream agent output, capped for prompt embedding. */
export function contextJson(value: unknown, cap = CONTEXT_CHAR_CAP): string {
  return truncate(JSON.stringify(value, null, 2), cap);
}

import type { Message } from "../types/llm.js";

export const HISTORY_LIMIT = 20;

/** Drop the oldest entries so at most `limit` remain, in place. */
export function truncateTranscript(history: Message[], limit: number = HISTORY_LIMIT): Message[] {
  const excess = history.length - Math.max(0, limit);
  if (excess > 0) history.splice(0, excess);
  return history;
}

import type { ToolCallPayload } from "../types/tools.js";
import { warn } from "../log.js";
import { errorMessage } from "../errors.js";

export const TOOL_CALL_MARKER = "TOOL_CALL:";

/**
 * Slice the first balanced {...} object off the front of `text`. Braces inside JSON
 * strings are counted too. Unbalanced input returns the whole text.
 */
export function sliceBalancedObject(text: string): string {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(0, i + 1);
    }
  }
  return text;
}

/**
 * Find a tool call embedded in model output as `TOOL_CALL: {...}`.
 * Returns null when there is no marker, when no object follows it, or when the
 * object is not valid JSON. Never throws.
 */
export function extractToolCall(text: string): ToolCallPayload | null {
  const at = text.indexOf(TOOL_CALL_MARKER);
  if (at === -1) return null;

  const rest = text.slice(at + TOOL_CALL_MARKER.length).trimStart();
  if (!rest.startsWith("{")) return null;

  const candidate = sliceBalancedObject(rest);
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (e) {
    warn(`Could not parse tool call: ${errorMessage(e)}`);
    return null;
  }
  if (!isPayload(parsed)) {
    warn("Tool call payload is not a JSON object");
    return null;
  }
  return parsed;
}

function isPayload(v: unknown): v is ToolCallPayload {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

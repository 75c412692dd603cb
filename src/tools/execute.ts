import type { ToolBackend, ToolCallPayload, ToolCallRequest, ToolCallResult, ToolContent } from "../types/tools.js";
import { ToolExecutionError, errorMessage } from "../errors.js";
import { logTool } from "../log.js";

export const NO_CONTENT = "Tool executed successfully but returned no content";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Shape-check a payload the extractor pulled out of model text. Missing arguments mean none. */
export function parseToolCallRequest(payload: ToolCallPayload): ToolCallRequest {
  const name = payload.tool_name;
  if (typeof name !== "string" || name.trim() === "") {
    throw new ToolExecutionError("Tool call is missing a tool_name");
  }
  const args = payload.arguments ?? {};
  if (!isRecord(args)) {
    throw new ToolExecutionError(`Tool call arguments for ${name} must be a JSON object`, name);
  }
  return { tool_name: name, arguments: args };
}

function contentToText(item: ToolContent): string {
  if (typeof item.text === "string") return item.text;
  if (typeof item.data === "string") return item.data;
  return JSON.stringify(item);
}

/**
 * Run one tool on the backend and reduce its result to text. Both tool-reported failures
 * and channel failures come back as ToolExecutionError.
 */
export async function executeTool(backend: ToolBackend, call: ToolCallRequest): Promise<string> {
  logTool(call.tool_name, call.arguments);

  let result: ToolCallResult;
  try {
    result = await backend.callTool(call.tool_name, call.arguments);
  } catch (e) {
    throw new ToolExecutionError(`${call.tool_name} failed: ${errorMessage(e)}`, call.tool_name);
  }

  if (result.isError) {
    const detail = result.content.map(contentToText).join("\n") || "no details";
    throw new ToolExecutionError(`Tool execution failed: ${detail}`, call.tool_name);
  }

  const first = result.content[0];
  return first ? contentToText(first) : NO_CONTENT;
}

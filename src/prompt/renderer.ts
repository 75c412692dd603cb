import { readFileSync } from "node:fs";
import type { Message } from "../types/llm.js";
import type { ToolDescriptor } from "../types/tools.js";
import { TOOL_CALL_MARKER } from "../orchestrator/extract.js";
import { errorMessage } from "../errors.js";

export function loadSchemaContext(path: string): string {
  try {
    return readFileSync(path, "utf-8").trim();
  } catch (e) {
    throw new Error(`Failed to read schema context ${path}: ${errorMessage(e)}`);
  }
}

/** `run_select_query(query)`, with optional parameters marked `?`. */
export function toolSignature(tool: ToolDescriptor): string {
  const props = tool.input_schema.properties;
  const required = Array.isArray(tool.input_schema.required)
    ? tool.input_schema.required.filter((r): r is string => typeof r === "string")
    : [];
  const params = props && typeof props === "object" && !Array.isArray(props)
    ? Object.keys(props).map(k => required.includes(k) ? k : `${k}?`)
    : [];
  return `${tool.name}(${params.join(", ")})`;
}

export function buildSystemPrompt(schemaContext: string, tools: ToolDescriptor[]): string {
  const toolLines = tools.length
    ? tools.map(t => `- ${t.name}: ${t.description || "(no description)"}`)
    : ["No tools available."];
  const signatureLines = tools.length
    ? tools.map(t => `- ${toolSignature(t)}`)
    : ["- none"];

  return [
    "You are a blockchain analytics assistant with access to Ethereum consensus layer data.",
    "",
    schemaContext,
    "",
    "AVAILABLE TOOLS:",
    ...toolLines,
    "",
    "INSTRUCTIONS:",
    "1. When users ask about blockchain data, work out what information you need.",
    "2. Use the tools above to query the database.",
    "3. For SQL, write ClickHouse-compatible queries with a LIMIT clause.",
    "4. Explain your findings in clear, user-friendly language.",
    "5. If you need several queries, run them one step at a time.",
    "",
    "TOOL USAGE FORMAT:",
    "When you need a tool, respond with:",
    `${TOOL_CALL_MARKER} {`,
    `    "tool_name": "tool_name_here",`,
    `    "arguments": {"arg1": "value1", "arg2": "value2"}`,
    "}",
    "",
    "TOOL SIGNATURES (parameters ending in ? are optional; the database connection is already established):",
    ...signatureLines,
    "",
    "After receiving tool results, give a comprehensive answer based on the data."
  ].join("\n");
}

/** System prompt, then the transcript, then the message being asked now. */
export function renderMessages(systemPrompt: string, history: Message[], current: string): Message[] {
  return [
    { role: "system", content: systemPrompt },
    ...history,
    { role: "user", content: current }
  ];
}

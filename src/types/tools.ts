export type JsonSchema = Record<string, unknown>;

export interface ToolDescriptor {
  name: string;
  description: string;
  input_schema: JsonSchema;
}

/** Parsed JSON object that followed the tool-call marker, not yet validated. */
export type ToolCallPayload = Record<string, unknown>;

export interface ToolCallRequest {
  tool_name: string;
  arguments: Record<string, unknown>;
}

/** One content item of a tool result; `text` for text items, `data` for binary ones. */
export interface ToolContent {
  type: string;
  text?: string;
  data?: string;
  mimeType?: string;
  [key: string]: unknown;
}

export interface ToolCallResult {
  content: ToolContent[];
  isError: boolean;
}

export interface ToolBackend {
  listTools(): Promise<ToolDescriptor[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult>;
}

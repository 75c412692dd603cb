import readline from "node:readline";
import { z } from "zod";
import type { ToolBackend, ToolCallResult, ToolDescriptor } from "../types/tools.js";
import { JsonRpcError } from "../errors.js";
import {
  encodeMessage, parseMessage, rpcError, rpcNotification, rpcOk, rpcRequest,
  type JsonRpcMessage, type JsonRpcRequest, type JsonRpcResponse
} from "./jsonrpc.js";
import type { Transport } from "./transport.js";

export const PROTOCOL_VERSION = "2024-11-05";
const METHOD_NOT_FOUND = -32601;

const InitializeResult = z.object({
  protocolVersion: z.string(),
  serverInfo: z.object({ name: z.string(), version: z.string().optional() }).passthrough().optional(),
  capabilities: z.record(z.unknown()).optional()
});

const ListToolsResult = z.object({
  tools: z.array(z.object({
    name: z.string(),
    description: z.string().nullish(),
    inputSchema: z.record(z.unknown()).nullish()
  })),
  nextCursor: z.string().nullish()
});

const CallToolResult = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
    data: z.string().optional(),
    mimeType: z.string().optional()
  }).passthrough()).default([]),
  isError: z.boolean().nullish()
});

export interface ClientInfo {
  name: string;
  version: string;
}

interface Pending {
  method: string;
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
}

/**
 * Client side of an MCP tool server reached over a newline-delimited JSON-RPC channel.
 * Callers issue one request at a time; replies are still matched by id.
 */
export class StdioToolClient implements ToolBackend {
  private nextId = 1;
  private pending = new Map<number, Pending>();
  private closedWith: Error | null = null;
  private lines: readline.Interface;
  serverName?: string;

  constructor(
    private transport: Transport,
    private clientInfo: ClientInfo = { name: "consensus-chat", version: "0.1.0" }
  ) {
    this.lines = readline.createInterface({ input: transport.output, crlfDelay: Infinity });
    this.lines.on("line", line => this.onLine(line));
    this.lines.on("close", () => this.failAll(new Error("tool server closed the connection")));
    transport.output.on("error", err => this.failAll(new Error(`tool server channel failed: ${err.message}`)));
    transport.input.on("error", err => this.failAll(new Error(`tool server channel failed: ${err.message}`)));
  }

  async initialize(): Promise<void> {
    const raw = await this.request("initialize", {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: this.clientInfo
    });
    const result = validate(InitializeResult, raw, "initialize");
    this.serverName = result.serverInfo?.name;
    this.send(rpcNotification("notifications/initialized"));
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;
    do {
      const raw = await this.request("tools/list", cursor ? { cursor } : undefined);
      const page = validate(ListToolsResult, raw, "tools/list");
      for (const t of page.tools) {
        tools.push({ name: t.name, description: t.description ?? "", input_schema: t.inputSchema ?? {} });
      }
      cursor = page.nextCursor ?? undefined;
    } while (cursor);
    return tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const raw = await this.request("tools/call", { name, arguments: args });
    const result = validate(CallToolResult, raw, "tools/call");
    return { content: result.content, isError: result.isError === true };
  }

  async close(): Promise<void> {
    this.failAll(new Error("tool client closed"));
    this.lines.close();
    await this.transport.close();
  }

  private request(method: string, params?: Record<string, unknown>): Promise<unknown> {
    if (this.closedWith) return Promise.reject(this.closedWith);
    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
      this.send(rpcRequest(id, method, params));
    });
  }

  private send(msg: JsonRpcMessage): void {
    this.transport.input.write(encodeMessage(msg));
  }

  private onLine(line: string): void {
    const incoming = parseMessage(line);
    if (!incoming) return;
    switch (incoming.kind) {
      case "response":
        this.settle(incoming.message);
        break;
      case "request":
        this.answerServerRequest(incoming.message);
        break;
      case "notification":
        // progress and log notifications carry nothing the chat needs
        break;
    }
  }

  private settle(res: JsonRpcResponse): void {
    if (typeof res.id !== "number") return;
    const p = this.pending.get(res.id);
    if (!p) return;
    this.pending.delete(res.id);
    if (res.error) p.reject(new JsonRpcError(res.error.code, `${p.method}: ${res.error.message}`, res.error.data));
    else p.resolve(res.result);
  }

  private answerServerRequest(req: JsonRpcRequest): void {
    if (req.method === "ping") this.send(rpcOk(req.id, {}));
    else this.send(rpcError(req.id, METHOD_NOT_FOUND, `Method not found: ${req.method}`));
  }

  private failAll(err: Error): void {
    if (!this.closedWith) this.closedWith = err;
    for (const [id, p] of this.pending) {
      this.pending.delete(id);
      p.reject(err);
    }
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown, method: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "result"}: ${i.message}`).join("; ");
    throw new Error(`${method}: unexpected result shape (${issues})`);
  }
  return parsed.data;
}

import { z } from "zod";

export type JsonRpcId = string | number;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
};

export type JsonRpcNotification = Omit<JsonRpcRequest, "id">;

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
};

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

const IdSchema = z.union([z.string(), z.number()]);

const IncomingSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: IdSchema.nullish(),
  method: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }).optional()
});

export type Incoming =
  | { kind: "request"; message: JsonRpcRequest }
  | { kind: "notification"; message: JsonRpcNotification }
  | { kind: "response"; message: JsonRpcResponse };

export function encodeMessage(msg: JsonRpcMessage): string {
  return JSON.stringify(msg) + "\n";
}

/**
 * Classify one line read from the server. Servers may print banners or stray logs on
 * stdout; anything that is not a JSON-RPC 2.0 message yields null.
 */
export function parseMessage(line: string): Incoming | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return null;

  let raw: unknown;
  try { raw = JSON.parse(trimmed); } catch { return null; }

  const parsed = IncomingSchema.safeParse(raw);
  if (!parsed.success) return null;
  const m = parsed.data;

  if (m.method !== undefined) {
    if (m.id === undefined || m.id === null) {
      return { kind: "notification", message: { jsonrpc: "2.0", method: m.method, params: m.params } };
    }
    return { kind: "request", message: { jsonrpc: "2.0", id: m.id, method: m.method, params: m.params } };
  }
  if (m.id === undefined) return null;
  return { kind: "response", message: { jsonrpc: "2.0", id: m.id, result: m.result, error: m.error } };
}

export function rpcRequest(id: JsonRpcId, method: string, params?: Record<string, unknown>): JsonRpcRequest {
  return { jsonrpc: "2.0", id, method, params };
}

export function rpcNotification(method: string, params?: Record<string, unknown>): JsonRpcNotification {
  return { jsonrpc: "2.0", method, params };
}

export function rpcOk(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message, data } };
}

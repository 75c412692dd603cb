import type { LLMProvider } from "../llm/provider.js";
import type { Message } from "../types/llm.js";
import type { ToolBackend, ToolDescriptor } from "../types/tools.js";
import type { AppConfig } from "../config.js";
import { StdioToolClient } from "../mcp/client.js";
import { spawnStdioTransport, type Transport } from "../mcp/transport.js";
import { COLOR, info, warn } from "../log.js";
import { errorMessage } from "../errors.js";
import { HISTORY_LIMIT } from "./transcript.js";

export const MAX_TOOL_ITERATIONS = 3;

/** Everything one chat needs, passed explicitly to every step of a turn. */
export interface ChatSession {
  provider: LLMProvider;
  backend: ToolBackend;
  tools: ToolDescriptor[];
  schemaContext: string;
  model: string;
  temperature: number;
  maxTokens: number;
  maxIterations: number;
  historyLimit: number;
  history: Message[];
}

export interface SessionOptions {
  provider: LLMProvider;
  backend: ToolBackend;
  schemaContext: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxIterations?: number;
  historyLimit?: number;
}

/**
 * Discover the backend's tools once and start an empty transcript. A failed discovery
 * leaves the session without tools rather than aborting it.
 */
export async function createSession(opts: SessionOptions): Promise<ChatSession> {
  let tools: ToolDescriptor[] = [];
  try {
    tools = await opts.backend.listTools();
    info(COLOR.green(`Discovered ${tools.length} tool(s):`));
    for (const t of tools) info(COLOR.gray(`   - ${t.name}: ${t.description}`));
  } catch (e) {
    warn(`Could not discover tools: ${errorMessage(e)}`);
  }

  return {
    provider: opts.provider,
    backend: opts.backend,
    tools,
    schemaContext: opts.schemaContext,
    model: opts.model,
    temperature: opts.temperature ?? 0.1,
    maxTokens: opts.maxTokens ?? 1000,
    maxIterations: opts.maxIterations ?? MAX_TOOL_ITERATIONS,
    historyLimit: opts.historyLimit ?? HISTORY_LIMIT,
    history: []
  };
}

export type ConnectTransport = (cfg: AppConfig) => Transport;

const spawnConfigured: ConnectTransport = cfg => spawnStdioTransport(cfg.mcpCommand, cfg.mcpArgs, process.env);

/**
 * Spawn and initialize the configured tool server, hand it to `fn`, and shut it down
 * afterwards whether `fn` resolves or throws.
 */
export async function withToolBackend<T>(
  cfg: AppConfig,
  fn: (client: StdioToolClient) => Promise<T>,
  connect: ConnectTransport = spawnConfigured
): Promise<T> {
  info(COLOR.cyan(`Connecting to tool server: ${[cfg.mcpCommand, ...cfg.mcpArgs].join(" ")}`));
  const client = new StdioToolClient(connect(cfg));
  try {
    await client.initialize();
    info(COLOR.green(`Tool server ready${client.serverName ? ` (${client.serverName})` : ""}`));
    return await fn(client);
  } finally {
    await client.close();
  }
}

import { resolve } from "node:path";

export type AppConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  mcpCommand: string;
  mcpArgs: string[];
  schemaFile: string;
};

export const DEFAULT_MODEL = "llama-3.1-70b-versatile";
export const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";

function env(name: string, def: string, source: NodeJS.ProcessEnv): string {
  return source[name]?.trim() || def;
}

function envNumber(name: string, def: number, source: NodeJS.ProcessEnv): number {
  const raw = source[name];
  if (raw == null || raw.trim() === "") return def;
  const v = Number(raw);
  return Number.isFinite(v) && v >= 0 ? v : def;
}

/** Read settings from the environment. Load `.env` (dotenv/config) before calling this. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    apiKey: env("GROQ_API_KEY", "", source),
    baseUrl: env("GROQ_BASE_URL", DEFAULT_BASE_URL, source),
    model: env("GROQ_MODEL", DEFAULT_MODEL, source),
    temperature: envNumber("LLM_TEMPERATURE", 0.1, source),
    maxTokens: Math.max(1, Math.floor(envNumber("LLM_MAX_TOKENS", 1000, source))),
    mcpCommand: env("MCP_SERVER_COMMAND", "python", source),
    mcpArgs: env("MCP_SERVER_ARGS", "-m mcp_clickhouse.main", source).split(/\s+/).filter(Boolean),
    schemaFile: resolve(process.cwd(), env("SCHEMA_CONTEXT_FILE", "prompts/goteth_schema.txt", source))
  };
}

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export interface CompletionArgs {
  model: string;
  messages: Message[];
  temperature?: number;
  max_tokens?: number;
  stop?: string[];
  top_p?: number;
}

export interface CompletionOut {
  content: string;
  finish_reason?: string;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

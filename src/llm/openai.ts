import { z } from "zod";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";

const ChatCompletionResponse = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).passthrough(),
    finish_reason: z.string().nullish()
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number()
  }).nullish()
});

/**
 * Chat-completions adapter for any OpenAI-compatible endpoint. Groq serves one at
 * https://api.groq.com/openai/v1, which is the default base URL in config.
 */
export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.groq.com/openai/v1'
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      stop: args.stop,
      top_p: args.top_p
    };

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body)
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`LLM HTTP ${res.status}: ${text}`);
    }

    const parsed = ChatCompletionResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`LLM response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const choice = parsed.data.choices[0];

    return {
      content: choice.message.content ?? '',
      finish_reason: choice.finish_reason ?? undefined,
      usage: parsed.data.usage ?? undefined
    };
  }
}

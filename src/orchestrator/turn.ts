// One user turn: ask the model, run the tool it asks for, feed the result back, repeat.
// States: awaiting_llm -> (terminal | invoking) -> (terminal | awaiting_llm).
// Every backend or tool failure ends the turn with a readable answer; nothing is rethrown.

import type { ChatSession } from "../session/index.js";
import type { ToolCallPayload } from "../types/tools.js";
import { buildSystemPrompt, renderMessages } from "../prompt/renderer.js";
import { extractToolCall } from "./extract.js";
import { executeTool, parseToolCallRequest } from "../tools/execute.js";
import { truncateTranscript } from "../session/transcript.js";
import { errorMessage } from "../errors.js";
import { COLOR, fmtMs, info } from "../log.js";

export const FOLLOW_UP_INSTRUCTION = "Please provide a comprehensive answer based on the tool results above.";
export const EXHAUSTED_ANSWER = "I'm having trouble completing this request after multiple attempts.";
export const LLM_ERROR_PREFIX = "Error getting LLM response: ";
export const TOOL_ERROR_PREFIX = "I encountered an error while querying the database: ";

export type TurnStatus = "answered" | "llm_error" | "tool_error" | "exhausted";

export interface TurnOutcome {
  answer: string;
  status: TurnStatus;
  llmCalls: number;
  toolCalls: number;
}

type TurnState =
  | { kind: "awaiting_llm"; message: string; iteration: number }
  | { kind: "invoking"; response: string; payload: ToolCallPayload; iteration: number }
  | { kind: "terminal"; status: TurnStatus; answer: string };

/** Ask the model once with the session's prompt, transcript and `message`. */
export async function askModel(session: ChatSession, message: string): Promise<string> {
  const out = await session.provider.complete({
    model: session.model,
    messages: renderMessages(buildSystemPrompt(session.schemaContext, session.tools), session.history, message),
    temperature: session.temperature,
    max_tokens: session.maxTokens
  });
  return out.content;
}

export async function runTurn(session: ChatSession, userMessage: string): Promise<TurnOutcome> {
  const { history } = session;
  let questionRecorded = false;
  let llmCalls = 0;
  let toolCalls = 0;
  let state: TurnState = { kind: "awaiting_llm", message: userMessage, iteration: 0 };

  for (;;) {
    switch (state.kind) {
      case "awaiting_llm": {
        const { message, iteration }: { message: string; iteration: number } = state;
        info(COLOR.gray(`  iter ${iteration + 1} — thinking`));
        llmCalls++;
        let response: string;
        try {
          response = await askModel(session, message);
        } catch (e) {
          state = { kind: "terminal", status: "llm_error", answer: LLM_ERROR_PREFIX + errorMessage(e) };
          break;
        }
        const payload = extractToolCall(response);
        state = payload
          ? { kind: "invoking", response, payload, iteration }
          : { kind: "terminal", status: "answered", answer: response };
        break;
      }

      case "invoking": {
        const { response, payload, iteration }: { response: string; payload: ToolCallPayload; iteration: number } = state;
        toolCalls++;
        const t0 = Date.now();
        let result: string;
        try {
          result = await executeTool(session.backend, parseToolCallRequest(payload));
        } catch (e) {
          state = { kind: "terminal", status: "tool_error", answer: TOOL_ERROR_PREFIX + errorMessage(e) };
          break;
        }
        info(COLOR.magenta(`  iter ${iteration + 1} — tool result ${COLOR.gray("(" + fmtMs(Date.now() - t0) + ")")}`));

        if (!questionRecorded) {
          history.push({ role: "user", content: userMessage });
          questionRecorded = true;
        }
        history.push(
          { role: "assistant", content: response },
          { role: "user", content: `Tool result: ${result}` }
        );

        state = iteration + 1 >= session.maxIterations
          ? { kind: "terminal", status: "exhausted", answer: EXHAUSTED_ANSWER }
          : { kind: "awaiting_llm", message: FOLLOW_UP_INSTRUCTION, iteration: iteration + 1 };
        break;
      }

      case "terminal": {
        if (!questionRecorded) history.push({ role: "user", content: userMessage });
        history.push({ role: "assistant", content: state.answer });
        truncateTranscript(history, session.historyLimit);
        return { answer: state.answer, status: state.status, llmCalls, toolCalls };
      }
    }
  }
}

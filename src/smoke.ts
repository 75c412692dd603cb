// End-to-end smoke test against the real completion API and tool server.
// Prints one line per step; nothing here is asserted.

import type { AppConfig } from './config.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { loadSchemaContext } from './prompt/renderer.js';
import { createSession, withToolBackend, type ChatSession } from './session/index.js';
import { askModel, runTurn } from './orchestrator/turn.js';
import { executeTool } from './tools/execute.js';
import { errorMessage } from './errors.js';
import { COLOR } from './log.js';

const TOOL_CHECKS: Array<{ tool: string; args: Record<string, unknown> }> = [
  { tool: 'list_databases', args: {} },
  { tool: 'list_tables', args: { database: 'goteth_mainnet' } }
];

const preview = (s: string, n: number) => (s.length > n ? s.slice(0, n) + '...' : s);

function pass(label: string, detail?: string): void {
  console.log(`${COLOR.green('✅')} ${label}${detail ? `\n   ${detail}` : ''}`);
}

function fail(label: string, err: unknown): void {
  console.log(`${COLOR.red('❌')} ${label}: ${errorMessage(err)}`);
}

async function step(label: string, fn: () => Promise<string | undefined>): Promise<boolean> {
  try {
    pass(label, await fn());
    return true;
  } catch (e) {
    fail(label, e);
    return false;
  }
}

async function runSteps(session: ChatSession): Promise<boolean> {
  let ok = true;
  for (const check of TOOL_CHECKS) {
    ok = (await step(check.tool, async () => {
      const out = await executeTool(session.backend, { tool_name: check.tool, arguments: check.args });
      return `Result preview: ${preview(out, 200)}`;
    })) && ok;
  }

  ok = (await step('LLM response', async () => {
    const out = await askModel(session, 'Hello, can you help me understand blockchain data?');
    return preview(out, 100);
  })) && ok;

  const question = 'How many databases are available?';
  ok = (await step('Full conversation turn', async () => {
    const outcome = await runTurn(session, question);
    if (outcome.status === 'llm_error' || outcome.status === 'tool_error') throw new Error(outcome.answer);
    return `Question: ${question}\n   Response: ${preview(outcome.answer, 200)}`;
  })) && ok;

  return ok;
}

export async function runSmokeTest(cfg: AppConfig): Promise<boolean> {
  console.log('Running consensus-chat smoke test...');

  if (!cfg.apiKey) {
    fail('GROQ_API_KEY', 'not found in the environment or .env file');
    return false;
  }
  pass('Found GROQ_API_KEY');

  const provider = new OpenAIChatCompletions(cfg.apiKey, cfg.baseUrl);
  let ok = false;
  try {
    const schemaContext = loadSchemaContext(cfg.schemaFile);
    ok = await withToolBackend(cfg, async backend => {
      const session = await createSession({
        provider, backend, schemaContext,
        model: cfg.model,
        temperature: cfg.temperature,
        maxTokens: cfg.maxTokens
      });
      pass('Tool server connection', `Available tools: ${session.tools.length}`);
      return runSteps(session);
    });
  } catch (e) {
    fail('Smoke test', e);
    ok = false;
  }

  console.log(ok
    ? COLOR.green('\nAll steps passed. Start chatting with: npm run chat')
    : COLOR.red('\nSome steps failed. Check the configuration.'));
  return ok;
}

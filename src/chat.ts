import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { AppConfig } from './config.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { loadSchemaContext } from './prompt/renderer.js';
import { createSession, withToolBackend, type ChatSession } from './session/index.js';
import { runTurn } from './orchestrator/turn.js';
import { COLOR, warn } from './log.js';

const EXIT_WORDS = new Set(['quit', 'exit', 'bye']);

export interface ChatIO {
  input: Readable;
  output: Writable;
}

export function isExitCommand(input: string): boolean {
  return EXIT_WORDS.has(input.trim().toLowerCase());
}

function printBanner(out: Writable): void {
  const rule = '='.repeat(72);
  out.write([
    '',
    rule,
    COLOR.cyan('  Consensus Chat: Ethereum consensus analytics over MCP'),
    '  Ask questions about validators, blocks, pools and rewards.',
    "  Type 'quit' to exit",
    rule,
    '',
    ''
  ].join('\n'));
}

/**
 * Read questions line by line and answer each with one turn. Lines typed or piped in
 * while a turn is running wait in the iterator's buffer until the turn finishes.
 */
export async function chatLoop(session: ChatSession, io: ChatIO): Promise<void> {
  const out = io.output;
  const rl = readline.createInterface({ input: io.input, output: out });
  const lines = rl[Symbol.asyncIterator]();
  let inputEnded = false;
  rl.once('close', () => { inputEnded = true; });
  rl.setPrompt('\nYou: ');
  try {
    for (;;) {
      if (!inputEnded) rl.prompt();
      const next = await lines.next();
      const input = next.done ? null : next.value.trim();
      if (input === null || isExitCommand(input)) {
        out.write('Goodbye!\n');
        break;
      }
      if (!input) continue;

      out.write(COLOR.gray('\nThinking...') + '\n');
      const { answer } = await runTurn(session, input);
      out.write(`\n${COLOR.green('Assistant:')} ${answer}\n`);
    }
  } finally {
    rl.close();
  }
}

export async function chat(cfg: AppConfig, io: ChatIO = { input: process.stdin, output: process.stdout }): Promise<void> {
  if (!cfg.apiKey) {
    warn('GROQ_API_KEY not set. Completion calls will fail.');
  }
  printBanner(io.output);

  const provider = new OpenAIChatCompletions(cfg.apiKey || 'DUMMY', cfg.baseUrl);
  const schemaContext = loadSchemaContext(cfg.schemaFile);

  await withToolBackend(cfg, async backend => {
    const session = await createSession({
      provider, backend, schemaContext,
      model: cfg.model,
      temperature: cfg.temperature,
      maxTokens: cfg.maxTokens
    });
    await chatLoop(session, io);
  });
}

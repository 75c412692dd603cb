#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { chat } from './chat.js';
import { runSmokeTest } from './smoke.js';

async function main(): Promise<void> {
  const command = process.argv[2]?.toLowerCase();
  const cfg = loadConfig();

  switch (command) {
    case 'smoke':
    case 'test': {
      const ok = await runSmokeTest(cfg);
      if (!ok) process.exitCode = 1;
      break;
    }
    case 'help':
    case '--help':
    case '-h':
      console.log('Usage:');
      console.log('  consensus-chat          Start the interactive chat');
      console.log('  consensus-chat smoke    Run the end-to-end smoke test');
      console.log('  consensus-chat help     Show this help message');
      break;
    default:
      await chat(cfg);
  }
}

main().catch(err => {
  console.error('[fatal]', err);
  process.exit(1);
});

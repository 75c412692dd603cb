import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";

/** A bidirectional line channel to a tool server: we write to `input`, it answers on `output`. */
export interface Transport {
  input: Writable;
  output: Readable;
  close(): Promise<void>;
}

/** The parts of a spawned child the transport drives; emits `exit` and `error`. */
export interface ServerProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

/** How long a server gets to exit after SIGTERM before it is sent SIGKILL. */
export const KILL_GRACE_MS = 3000;

/**
 * Launch the tool server as a child process speaking JSON-RPC over stdin/stdout.
 * Its stderr is passed through so server-side logs stay visible.
 */
export function spawnStdioTransport(command: string, args: string[], env: NodeJS.ProcessEnv = process.env): Transport {
  return processTransport(spawn(command, args, { env, stdio: ["pipe", "pipe", "inherit"] }));
}

export function processTransport(child: ServerProcess, graceMs = KILL_GRACE_MS): Transport {
  let exited = false;

  const exit = new Promise<void>(resolve => {
    child.once("exit", () => { exited = true; resolve(); });
    child.once("error", () => { exited = true; resolve(); });
  });

  // ENOENT and friends surface on the child, not on the pipes; route them to the
  // reader so pending requests fail instead of hanging.
  child.once("error", (err: Error) => child.stdout.destroy(err));

  return {
    input: child.stdin,
    output: child.stdout,
    async close() {
      if (exited) return;
      child.stdin.end();
      child.kill();
      const escalate = setTimeout(() => {
        if (!exited) child.kill("SIGKILL");
      }, graceMs);
      try {
        await exit;
      } finally {
        clearTimeout(escalate);
      }
    }
  };
}

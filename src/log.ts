// Console output helpers shared by the chat loop, the orchestrator and the smoke test.
// QUIET=1 silences progress lines; LOG_TOOLS=0 hides tool invocations. Warnings always print.

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

const QUIET = process.env.QUIET === "1";
const LOG_TOOLS = !QUIET && (process.env.LOG_TOOLS ?? "1") !== "0";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function info(line: string): void {
  if (!QUIET) console.log(line);
}

export function warn(line: string): void {
  console.warn(COLOR.yellow(`[warn] ${line}`));
}

export function logTool(name: string, args: Record<string, unknown>): void {
  if (!LOG_TOOLS) return;
  let preview = JSON.stringify(args);
  if (preview.length > 140) preview = preview.slice(0, 140) + "…";
  console.log(COLOR.yellow(`  ↳ tool ${name}(${preview})`));
}

import { createInterface, type Interface } from "node:readline/promises";
import type { Prompt } from "../config";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 12345;

export interface CliArgs {
  config?: string;
  host?: string;
  port?: string;
}

/** Reads `--key=value` flags; unknown flags and bare words are ignored. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {};
  for (const arg of argv) {
    const match = /^--(config|host|port)=(.*)$/.exec(arg);
    if (!match) continue;
    const [, key, value] = match;
    if (key === "config") args.config = value;
    else if (key === "host") args.host = value;
    else args.port = value;
  }
  return args;
}

export const resolvePort = (value: string | undefined): number => {
  if (value === undefined || !/^\d+$/.test(value)) return DEFAULT_PORT;
  const port = Number.parseInt(value, 10);
  return port > 0 && port < 65536 ? port : DEFAULT_PORT;
};

/** Console prompt that only opens stdin when a question is actually asked. */
export function createStdinPrompt(): { prompt: Prompt; close: () => void } {
  let rl: Interface | undefined;
  return {
    prompt: question => {
      rl ??= createInterface({ input: process.stdin, output: process.stdout });
      return rl.question(question);
    },
    close: () => {
      rl?.close();
      rl = undefined;
    },
  };
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

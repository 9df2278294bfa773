#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { SlidewireClient } from "../client";
import { loadClientConfig } from "../config";
import { createConsoleSessionLogger } from "../session-logger";
import {
  DEFAULT_HOST,
  createStdinPrompt,
  errorMessage,
  parseCliArgs,
  resolvePort,
} from "./args";

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

export async function main(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  const stdin = createStdinPrompt();
  const { config } = await loadClientConfig(
    args.config ?? "client_config.txt",
    stdin.prompt,
  ).finally(stdin.close);

  let sourceData: string;
  try {
    sourceData = await readFile(config.message, "utf8");
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    console.error(`Error: message file '${config.message}' not found.`);
    return 1;
  }

  const client = new SlidewireClient({
    host: args.host || DEFAULT_HOST,
    port: resolvePort(args.port),
    sourceData,
    windowSize: config.windowSize,
    timeoutSeconds: config.timeoutSeconds,
  });
  createConsoleSessionLogger("client").attachClient(client, config.windowSize);

  try {
    const result = await client.send();
    return result.confirmed ? 0 : 1;
  } catch (err) {
    console.error(`[client] ${errorMessage(err)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    err => {
      console.error("[client] fatal:", err);
      process.exitCode = 1;
    },
  );
}

#!/usr/bin/env node
import { SlidewireServer } from "../server";
import { loadServerConfig } from "../config";
import { createConsoleSessionLogger } from "../session-logger";
import {
  DEFAULT_HOST,
  createStdinPrompt,
  errorMessage,
  parseCliArgs,
  resolvePort,
} from "./args";

/** Listens until SIGINT or SIGTERM, printing every delivered message. */
export async function main(argv: readonly string[]): Promise<SlidewireServer> {
  const args = parseCliArgs(argv);
  const stdin = createStdinPrompt();
  const { config } = await loadServerConfig(
    args.config ?? "server_config.txt",
    stdin.prompt,
  ).finally(stdin.close);

  const server = new SlidewireServer({
    host: args.host || DEFAULT_HOST,
    port: resolvePort(args.port),
    maxMessageSize: config.maxMessageSize,
    adaptiveSizing: config.adaptiveSizing,
    windowSize: config.windowSize,
    timeoutSeconds: config.timeoutSeconds,
  });
  createConsoleSessionLogger("server").attachServer(server);

  const shutdown = () => {
    server.close().then(
      () => console.log("[server] Server closed."),
      err => console.error(`[server] ${errorMessage(err)}`),
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.listen();
  return server;
}

if (require.main === module) {
  main(process.argv.slice(2)).catch(err => {
    console.error("[server] fatal:", err);
    process.exitCode = 1;
  });
}

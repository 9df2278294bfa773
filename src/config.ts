import { readFile } from "node:fs/promises";
import { z } from "zod";
import { maxDataRecordLength } from "./codecs";
import { SlidewireError } from "./errors";
import { DEFAULT_MAX_LINE_LENGTH } from "./framing";

export const senderConfigSchema = z.object({
  /** Text to transfer; the engine never reads files itself. */
  sourceData: z.string(),
  windowSize: z.number().int().positive(),
  timeoutSeconds: z.number().positive().finite(),
  /** Transfer-loop read granularity; clamped to a tenth of the timeout. */
  pollIntervalMs: z.number().positive().finite().optional(),
});

export const receiverConfigSchema = z.object({
  maxMessageSize: z.number().int().positive(),
  adaptiveSizing: z.boolean(),
  // Accepted for parity with the config file; the receiver engine ignores them.
  windowSize: z.number().int().positive().optional(),
  timeoutSeconds: z.number().positive().finite().optional(),
});

export type SenderConfig = z.infer<typeof senderConfigSchema>;
export type ReceiverConfig = z.infer<typeof receiverConfigSchema>;

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");

export function parseSenderConfig(input: unknown): SenderConfig {
  const parsed = senderConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SlidewireError(
      "E_INVALID_CONFIG",
      `Invalid sender config: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

export function parseReceiverConfig(input: unknown): ReceiverConfig {
  const parsed = receiverConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SlidewireError(
      "E_INVALID_CONFIG",
      `Invalid receiver config: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

/**
 * Line limit for a receiver: large enough for any DATA record whose payload
 * fits `maxMessageSize`. An explicit limit below that is a config error.
 */
export function resolveReceiverLineLimit(
  maxMessageSize: number,
  maxLineLength?: number,
): number {
  const required = maxDataRecordLength(maxMessageSize);
  if (maxLineLength === undefined) {
    return Math.max(DEFAULT_MAX_LINE_LENGTH, required);
  }
  if (maxLineLength < required) {
    throw new SlidewireError(
      "E_INVALID_CONFIG",
      `maxLineLength ${maxLineLength} cannot hold a DATA record for maxMessageSize ${maxMessageSize} (needs ${required})`,
    );
  }
  return maxLineLength;
}

// ---------------------------------------------------------------------------
// Config files: one `key: value` per line
// ---------------------------------------------------------------------------

export interface ClientFileConfig {
  /** Path of the message file to send */
  message: string;
  windowSize: number;
  timeoutSeconds: number;
}

export interface ServerFileConfig {
  maxMessageSize: number;
  windowSize: number;
  adaptiveSizing: boolean;
  timeoutSeconds: number;
  message: string;
}

export const CLIENT_CONFIG_DEFAULTS: Readonly<ClientFileConfig> = Object.freeze({
  message: "message.txt",
  windowSize: 4,
  timeoutSeconds: 5,
});

export const SERVER_CONFIG_DEFAULTS: Readonly<ServerFileConfig> = Object.freeze({
  maxMessageSize: 400,
  windowSize: 4,
  adaptiveSizing: false,
  timeoutSeconds: 5,
  message: "",
});

const CONFIG_KEYS = [
  "maxMessageSize",
  "windowSize",
  "adaptiveSizing",
  "timeoutSeconds",
  "message",
] as const;

type ConfigKey = (typeof CONFIG_KEYS)[number];

const KEY_ALIASES: Record<ConfigKey, readonly string[]> = {
  maxMessageSize: [
    "maximum_message_size",
    "maximum_msg_size",
    "maximum",
    "mss",
    "max_msg_size",
  ],
  windowSize: ["window_size", "window", "window-size"],
  adaptiveSizing: ["dynamic_message_size", "dynamic", "dynamic_msg_size"],
  timeoutSeconds: ["timeout", "time_out"],
  message: ["message", "message_file", "message_path"],
};

export const canonicalConfigKey = (raw: string): ConfigKey | undefined => {
  const normalized = raw.trim().toLowerCase().replace(/ /g, "_");
  return CONFIG_KEYS.find(key => KEY_ALIASES[key].includes(normalized));
};

const parsePositiveInt = (value: string): number | undefined => {
  if (!/^[+-]?\d+$/.test(value)) return undefined;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
};

const parsePositiveNumber = (value: string): number | undefined => {
  if (value === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

const parseFlag = (value: string): boolean => value.toLowerCase() === "true";

/**
 * Yields `[key, value]` for every recognised `key: value` line. The line is
 * split on its first colon so values may contain colons (paths); double
 * quotes are removed from values.
 */
export function* readConfigEntries(
  text: string,
): Generator<[ConfigKey, string]> {
  for (const line of text.split(/\r?\n/)) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const key = canonicalConfigKey(line.slice(0, colon));
    if (!key) continue;
    yield [key, line.slice(colon + 1).trim().replace(/"/g, "")];
  }
}

/** Invalid values are skipped and keep the previous value. */
export function parseClientConfigText(text: string): ClientFileConfig {
  const config: ClientFileConfig = { ...CLIENT_CONFIG_DEFAULTS };
  for (const [key, value] of readConfigEntries(text)) {
    switch (key) {
      case "message":
        config.message = value;
        break;
      case "windowSize":
        config.windowSize = parsePositiveInt(value) ?? config.windowSize;
        break;
      case "timeoutSeconds":
        config.timeoutSeconds =
          parsePositiveNumber(value) ?? config.timeoutSeconds;
        break;
      default:
        break;
    }
  }
  return config;
}

export function parseServerConfigText(text: string): ServerFileConfig {
  const config: ServerFileConfig = { ...SERVER_CONFIG_DEFAULTS };
  for (const [key, value] of readConfigEntries(text)) {
    switch (key) {
      case "maxMessageSize":
        config.maxMessageSize =
          parsePositiveInt(value) ?? config.maxMessageSize;
        break;
      case "windowSize":
        config.windowSize = parsePositiveInt(value) ?? config.windowSize;
        break;
      case "adaptiveSizing":
        config.adaptiveSizing = parseFlag(value);
        break;
      case "timeoutSeconds":
        config.timeoutSeconds =
          parsePositiveNumber(value) ?? config.timeoutSeconds;
        break;
      case "message":
        config.message = value;
        break;
    }
  }
  return config;
}

/** Asks one question and resolves with the raw answer. */
export type Prompt = (question: string) => Promise<string>;

export interface LoadedConfig<T> {
  config: T;
  source: "file" | "prompt";
}

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

async function readConfigFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

/**
 * Reads the client config file; when it does not exist, asks for each value
 * instead. Empty or unparsable answers keep the defaults.
 */
export async function loadClientConfig(
  path: string,
  prompt?: Prompt,
): Promise<LoadedConfig<ClientFileConfig>> {
  const text = await readConfigFile(path);
  if (text !== undefined) {
    return { config: parseClientConfigText(text), source: "file" };
  }
  const config: ClientFileConfig = { ...CLIENT_CONFIG_DEFAULTS };
  if (!prompt) return { config, source: "prompt" };

  const message = (
    await prompt("Enter message file path (default 'message.txt'): ")
  ).trim();
  if (message) config.message = message;
  const window = await prompt("Enter window size (default 4): ");
  config.windowSize = parsePositiveInt(window.trim()) ?? config.windowSize;
  const timeout = await prompt("Enter timeout in seconds (default 5.0): ");
  config.timeoutSeconds =
    parsePositiveNumber(timeout.trim()) ?? config.timeoutSeconds;
  return { config, source: "prompt" };
}

export async function loadServerConfig(
  path: string,
  prompt?: Prompt,
): Promise<LoadedConfig<ServerFileConfig>> {
  const text = await readConfigFile(path);
  if (text !== undefined) {
    return { config: parseServerConfigText(text), source: "file" };
  }
  const config: ServerFileConfig = { ...SERVER_CONFIG_DEFAULTS };
  if (!prompt) return { config, source: "prompt" };

  const size = await prompt("Enter maximum message size (default 400): ");
  config.maxMessageSize =
    parsePositiveInt(size.trim()) ?? config.maxMessageSize;
  const window = await prompt("Enter window size (default 4): ");
  config.windowSize = parsePositiveInt(window.trim()) ?? config.windowSize;
  const dynamic = (
    await prompt("Dynamic message size? (true/false, default false): ")
  ).trim();
  if (dynamic) config.adaptiveSizing = parseFlag(dynamic);
  return { config, source: "prompt" };
}

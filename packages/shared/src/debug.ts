/**
 * Debug Channels
 *
 * Targeted debug logging for following what the parser, extractor and
 * resolvers decide while they run.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * MACRO_DEPS_DEBUG=resolve npm test            # Just macro-call resolution
 * MACRO_DEPS_DEBUG=resolve,dispatch npm test   # Multiple channels
 * MACRO_DEPS_DEBUG=* npm test                  # Everything
 * ```
 *
 * In code (always present, zero-cost when disabled):
 * ```typescript
 * debug.resolve("call.skipped", { name, reason });
 * debug.dispatch("lookup", { macroName, macroNamespace });
 * ```
 */

export type DebugData = Record<string, unknown>;

/** Logs one decision point; a no-op unless its channel is enabled. */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** `json` emits one object per line; `pretty` a `[channel.point] { k=v }` line. */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Sink for formatted lines; `console.log` by default. */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "MACRO_DEPS_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

/** Read at load; `refreshDebugChannels` re-reads it. */
let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData, depth = 0): string {
  const entries = Object.entries(data);
  if (entries.length === 0) return "{}";

  const parts: string[] = [];
  for (const [key, value] of entries) {
    parts.push(`${key}=${formatValue(value, depth)}`);
  }

  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100 || depth > 0) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function formatValue(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      const inline = `[${value.map((v) => formatValue(v, depth + 1)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    // AST nodes print as their kind
    if ("$kind" in value && typeof value.$kind === "string") {
      return `<${value.$kind}>`;
    }
    if ("name" in value && typeof value.name === "string") {
      return `<${value.name}>`;
    }
    if (depth < 1) {
      return formatData(Object.fromEntries(Object.entries(value)), depth + 1);
    }
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Re-read `MACRO_DEPS_DEBUG` and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  for (const name of CHANNELS) {
    debug[name] = createChannel(name);
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

const CHANNELS = ["parse", "extract", "resolve", "dispatch", "cache"] as const;

/** One channel per package concern. */
export const debug: Record<(typeof CHANNELS)[number], DebugChannel> = {
  /** Template scanning and parsing */
  parse: createChannel("parse"),

  /** Literal-only ref/source/config extraction */
  extract: createChannel("extract"),

  /** Macro-call resolution */
  resolve: createChannel("resolve"),

  /** adapter.dispatch resolution and namespace lookups */
  dispatch: createChannel("dispatch"),

  /** Parse cache hits and misses */
  cache: createChannel("cache"),
};

/**
 * Debug channels for the parsing pipeline.
 *
 * Each stage logs *what* it decided (line kinds, closed values, merges,
 * resolved references) through its own channel. Channels are selected with
 * the INISPAN_DEBUG environment variable:
 *
 * ```bash
 * INISPAN_DEBUG=classify npm test          # one stage
 * INISPAN_DEBUG=assemble,build npm test    # several
 * INISPAN_DEBUG=* npm test                 # everything
 * ```
 *
 * Disabled channels are no-op functions, so call sites stay in the code:
 * ```typescript
 * debug.assemble("value.close", { key, lines: 3 });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** JSON lines for tooling, or a compact human-readable form. */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Sink for formatted messages (defaults to console.log). */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "INISPAN_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    // Values can span many lines; keep one message per line.
    const escaped = JSON.stringify(value);
    return escaped.length > 62 ? `${escaped.slice(0, 58)}..."` : escaped;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map((v) => formatValue(v)).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) return () => {};
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Re-read INISPAN_DEBUG and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.classify = createChannel("classify");
  debug.assemble = createChannel("assemble");
  debug.build = createChannel("build");
  debug.interpolate = createChannel("interpolate");
  debug.typed = createChannel("typed");
  debug.lsp = createChannel("lsp");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Check a single channel, or whether any channel is on. */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Per-line classification decisions. */
  classify: createChannel("classify"),

  /** Logical entries: values opened, continued and closed. */
  assemble: createChannel("assemble"),

  /** Document building: sections, duplicates, policies. */
  build: createChannel("build"),

  /** Placeholder expansion and cache hits. */
  interpolate: createChannel("interpolate"),

  /** Typed coercion (@inispan/typed). */
  typed: createChannel("typed"),

  /** Editor mapping (@inispan/lsp). */
  lsp: createChannel("lsp"),
};

export type Debug = typeof debug;

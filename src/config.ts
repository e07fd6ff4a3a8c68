import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { Ajv } from "ajv";

import { ConfigError } from "./errors.js";

export interface GatewayConfig {
  bind: "loopback" | "0.0.0.0";
  port: number;
  bodyLimitBytes: number;
  auth: {
    mode: "token" | "none";
    token?: string;
  };
  protocolVersion: string;
}

export interface PersistenceConfig {
  /** Snapshot file. Unset means in-memory mode: the queue is lost on restart. */
  queueFile?: string;
  writeTimeoutMs: number;
  maxConsecutiveWriteFailures: number;
}

export interface SlackConfig {
  enabled: boolean;
  botToken?: string;
  /** When set, inbound Slack requests must carry a valid v0 signature. */
  signingSecret?: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
}

export interface RateLimitConfig {
  perMinute: number;
  methods: Record<string, number>;
}

export interface PrintQueueConfig {
  gateway: GatewayConfig;
  persistence: PersistenceConfig;
  slack: SlackConfig;
  rateLimit: RateLimitConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export const DEFAULT_CONFIG: PrintQueueConfig = {
  gateway: {
    bind: "loopback",
    port: 3152,
    bodyLimitBytes: 64 * 1024,
    auth: { mode: "token", token: "changeme" },
    protocolVersion: "1.0"
  },
  persistence: {
    writeTimeoutMs: 5_000,
    maxConsecutiveWriteFailures: 3
  },
  slack: {
    enabled: false,
    apiBaseUrl: "https://slack.com/api",
    requestTimeoutMs: 10_000
  },
  rateLimit: {
    perMinute: 60,
    methods: {
      "queue.add": 10,
      "queue.done": 10,
      "queue.cancel": 10
    }
  }
};

const CONFIG_SCHEMA = {
  type: "object",
  properties: {
    gateway: {
      type: "object",
      properties: {
        bind: { enum: ["loopback", "0.0.0.0"] },
        port: { type: "integer", minimum: 0, maximum: 65535 },
        bodyLimitBytes: { type: "integer", minimum: 1024 },
        auth: {
          type: "object",
          properties: {
            mode: { enum: ["token", "none"] },
            token: { type: "string" }
          },
          required: ["mode"]
        },
        protocolVersion: { type: "string", minLength: 1 }
      },
      required: ["bind", "port", "bodyLimitBytes", "auth", "protocolVersion"]
    },
    persistence: {
      type: "object",
      properties: {
        queueFile: { type: "string", minLength: 1 },
        writeTimeoutMs: { type: "integer", minimum: 1 },
        maxConsecutiveWriteFailures: { type: "integer", minimum: 1 }
      },
      required: ["writeTimeoutMs", "maxConsecutiveWriteFailures"]
    },
    slack: {
      type: "object",
      properties: {
        enabled: { type: "boolean" },
        botToken: { type: "string" },
        signingSecret: { type: "string" },
        apiBaseUrl: { type: "string", minLength: 1 },
        requestTimeoutMs: { type: "integer", minimum: 1 }
      },
      required: ["enabled", "apiBaseUrl", "requestTimeoutMs"]
    },
    rateLimit: {
      type: "object",
      properties: {
        perMinute: { type: "integer", minimum: 1 },
        methods: { type: "object", additionalProperties: { type: "integer", minimum: 1 } }
      },
      required: ["perMinute", "methods"]
    }
  },
  required: ["gateway", "persistence", "slack", "rateLimit"]
} as const;

const validateConfigShape = new Ajv({ strict: false, allErrors: true }).compile(CONFIG_SCHEMA);

function merge<T extends object>(base: T, override?: DeepPartial<T>): T {
  if (!override) {
    return base;
  }
  const out: Record<string, unknown> = { ...(base as Record<string, unknown>) };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = out[key];
    if (value && typeof value === "object" && !Array.isArray(value) && current && typeof current === "object") {
      out[key] = merge(current as object, value as DeepPartial<object>);
      continue;
    }
    out[key] = value;
  }
  return out as T;
}

export function loadConfig(raw?: DeepPartial<PrintQueueConfig>): PrintQueueConfig {
  const config = merge(DEFAULT_CONFIG, raw);
  if (!validateConfigShape(config)) {
    const detail = (validateConfigShape.errors ?? [])
      .map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`)
      .join("; ");
    throw new ConfigError(`invalid config: ${detail}`);
  }
  if (config.gateway.auth.mode === "token" && !config.gateway.auth.token) {
    throw new ConfigError("token auth requires gateway.auth.token");
  }
  if (config.slack.enabled && !config.slack.botToken) {
    throw new ConfigError("slack.enabled requires slack.botToken (or SLACK_BOT_TOKEN)");
  }
  return config;
}

export interface CliFlags {
  configPath?: string;
  queueFile?: string;
  port?: number;
}

export function parseArgv(argv: string[]): CliFlags {
  const flags: CliFlags = {};
  for (const arg of argv) {
    if (arg.startsWith("--config=")) {
      const value = arg.slice("--config=".length).trim();
      if (value) flags.configPath = value;
    } else if (arg.startsWith("--queue-file=")) {
      const value = arg.slice("--queue-file=".length).trim();
      if (value) flags.queueFile = value;
    } else if (arg.startsWith("--port=")) {
      const port = Number.parseInt(arg.slice("--port=".length), 10);
      if (!Number.isInteger(port)) {
        throw new ConfigError(`invalid --port value: ${arg}`);
      }
      flags.port = port;
    } else {
      throw new ConfigError(`unknown argument: ${arg}`);
    }
  }
  return flags;
}

export interface LoadConfigFromDiskOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  flags?: CliFlags;
}

export function resolveConfigPath(options: LoadConfigFromDiskOptions = {}): string {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.flags?.configPath ?? options.configPath ?? env.PRINTQ_CONFIG_PATH;
  return explicit ? resolve(cwd, explicit) : join(cwd, "printq.json");
}

function readConfigFile(configPath: string): DeepPartial<PrintQueueConfig> {
  if (!existsSync(configPath)) {
    return {};
  }
  const rawText = readFileSync(configPath, "utf8");
  try {
    return JSON.parse(rawText) as DeepPartial<PrintQueueConfig>;
  } catch (err) {
    throw new ConfigError(`cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function envOverrides(env: NodeJS.ProcessEnv): DeepPartial<PrintQueueConfig> {
  const out: DeepPartial<PrintQueueConfig> = {};
  if (env.PRINTQ_QUEUE_FILE) {
    out.persistence = { queueFile: env.PRINTQ_QUEUE_FILE };
  }
  const gateway: DeepPartial<GatewayConfig> = {};
  if (env.PORT) {
    const port = Number.parseInt(env.PORT, 10);
    if (!Number.isInteger(port)) {
      throw new ConfigError(`invalid PORT: ${env.PORT}`);
    }
    gateway.port = port;
  }
  if (env.PRINTQ_GATEWAY_TOKEN) {
    gateway.auth = { mode: "token", token: env.PRINTQ_GATEWAY_TOKEN };
  }
  if (Object.keys(gateway).length > 0) {
    out.gateway = gateway;
  }
  const slack: DeepPartial<SlackConfig> = {};
  if (env.PRINTQ_SLACK_ENABLED !== undefined) {
    slack.enabled = /^(1|true|yes)$/i.test(env.PRINTQ_SLACK_ENABLED);
  }
  if (env.SLACK_BOT_TOKEN) {
    slack.botToken = env.SLACK_BOT_TOKEN;
  }
  if (env.SLACK_SIGNING_SECRET) {
    slack.signingSecret = env.SLACK_SIGNING_SECRET;
  }
  if (Object.keys(slack).length > 0) {
    out.slack = slack;
  }
  return out;
}

/** Defaults, then the config file, then environment variables, then CLI flags. */
export function loadConfigFromDisk(options: LoadConfigFromDiskOptions = {}): PrintQueueConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const fromFile = merge(DEFAULT_CONFIG, readConfigFile(resolveConfigPath(options)));
  const withEnv = merge(fromFile, envOverrides(env));
  const flags = options.flags ?? {};
  const fromFlags: DeepPartial<PrintQueueConfig> = {};
  if (flags.queueFile !== undefined) {
    fromFlags.persistence = { queueFile: flags.queueFile };
  }
  if (flags.port !== undefined) {
    fromFlags.gateway = { port: flags.port };
  }
  const config = loadConfig(merge(withEnv, fromFlags));
  if (config.persistence.queueFile === undefined) {
    return config;
  }
  return {
    ...config,
    persistence: { ...config.persistence, queueFile: resolve(cwd, config.persistence.queueFile) }
  };
}

export interface StartupValidationOptions {
  allowInsecureDefaults: boolean;
}

export function validateStartupConfig(config: PrintQueueConfig, options: StartupValidationOptions): void {
  if (options.allowInsecureDefaults || config.gateway.auth.mode === "none") {
    return;
  }
  const token = config.gateway.auth.token?.trim();
  if (token === "changeme") {
    throw new ConfigError("refusing startup with placeholder gateway token");
  }
  if (token === "undefined" || token === "null") {
    throw new ConfigError('refusing startup with invalid literal gateway token ("undefined"/"null")');
  }
}

export function isDevMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return /^(1|true|yes)$/i.test(env.PRINTQ_DEV_MODE ?? "");
}

import { z } from "zod";

import { createLogger } from "./logger";

const log = createLogger("config");

// --- Configuration Schema ---

const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  host: z.string().min(1),
  baseUrl: z.string().url(),
  rpcPath: z.string().startsWith("/"),
  agentCardPath: z.string().startsWith("/"),
  subscriberBufferSize: z.number().int().positive(),
  keepAliveIntervalMs: z.number().int().positive(),
  jsonBodyLimit: z.string().min(1),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// Environment variables read by loadServerConfig, mapped to their config key.
const ENV_KEYS = {
  port: "PORT",
  host: "HOST",
  baseUrl: "BASE_URL",
  rpcPath: "A2A_RPC_PATH",
  agentCardPath: "A2A_AGENT_CARD_PATH",
  subscriberBufferSize: "A2A_SUBSCRIBER_BUFFER",
  keepAliveIntervalMs: "A2A_KEEPALIVE_MS",
  jsonBodyLimit: "A2A_JSON_LIMIT",
} as const;

const DEFAULTS = {
  port: 3001,
  host: "localhost",
  rpcPath: "/a2a",
  agentCardPath: "/.well-known/agent.json",
  subscriberBufferSize: 16,
  keepAliveIntervalMs: 30000,
  jsonBodyLimit: "5mb",
};

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  // Let the schema reject NaN with a readable issue rather than silently defaulting
  return Number(raw);
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

// --- Configuration Loading ---

/**
 * Builds the server configuration from environment variables, applying defaults
 * and deriving `baseUrl` from host and port when it is not set. Values in
 * `overrides` win over the environment.
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ServerConfig> = {},
): ServerConfig {
  const port = overrides.port ?? readInt(env, ENV_KEYS.port) ?? DEFAULTS.port;
  const host = overrides.host ?? readString(env, ENV_KEYS.host) ?? DEFAULTS.host;

  const candidate = {
    port,
    host,
    baseUrl: overrides.baseUrl ?? readString(env, ENV_KEYS.baseUrl) ?? `http://${host}:${port}`,
    rpcPath: overrides.rpcPath ?? readString(env, ENV_KEYS.rpcPath) ?? DEFAULTS.rpcPath,
    agentCardPath: overrides.agentCardPath ?? readString(env, ENV_KEYS.agentCardPath) ?? DEFAULTS.agentCardPath,
    subscriberBufferSize:
      overrides.subscriberBufferSize ?? readInt(env, ENV_KEYS.subscriberBufferSize) ?? DEFAULTS.subscriberBufferSize,
    keepAliveIntervalMs:
      overrides.keepAliveIntervalMs ?? readInt(env, ENV_KEYS.keepAliveIntervalMs) ?? DEFAULTS.keepAliveIntervalMs,
    jsonBodyLimit: overrides.jsonBodyLimit ?? readString(env, ENV_KEYS.jsonBodyLimit) ?? DEFAULTS.jsonBodyLimit,
  };

  const parsed = ServerConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    log.error({ issues: parsed.error.issues }, "Configuration validation failed");
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid server configuration: ${details}`);
  }
  log.debug({ config: parsed.data }, "Server configuration loaded");
  return parsed.data;
}

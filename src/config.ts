/**
 * Environment-variable-based configuration for the session proxy.
 *
 * `loadConfig` takes the environment explicitly so that tests can pass their
 * own object instead of mutating `process.env`.
 */
import { z } from "zod";

export type AccountBackendConfig =
  | { kind: "file"; accountsPath: string }
  | { kind: "api"; endpoint: string; secret?: string };

export interface Config {
  /** Interface this proxy binds to. */
  host: string;
  /** TCP port this proxy listens on. */
  port: number;
  /** Where credentials are resolved to profile identities. */
  accounts: AccountBackendConfig;
  /** Path of the persisted session document. */
  sessionsPath: string;
  /** Canonical hostname of the real session authority. */
  upstreamHost: string;
  /** Trusted resolvers used to find the authority behind the DNS override. */
  upstreamNameservers: string[];
  /** Bound on every outbound network call, in milliseconds. */
  upstreamTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const schema = z.object({
  BIND_ADDRESS: z.string().optional(),
  YGG_BIND_ADDRESS: z.string().optional(),
  ACCOUNT_BACKEND: z.enum(["file", "api"]).default("file"),
  ACCOUNTS_PATH: z.string().default("accounts.json"),
  ACCOUNT_API_ENDPOINT: z.string().url().optional(),
  ACCOUNT_API_SECRET: z.string().optional(),
  SESSIONS_PATH: z.string().default("sessions.json"),
  UPSTREAM_HOST: z.string().min(1).default("sessionserver.mojang.com"),
  UPSTREAM_NAMESERVERS: z.string().default("1.1.1.1,1.0.0.1"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

/** Split `host:port`, accepting a bracketed IPv6 host such as `[::]:3000`. */
export function parseBindAddress(address: string): { host: string; port: number } {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/.exec(address.trim());
  if (!match) {
    throw new ConfigError(`Invalid bind address: ${address}`);
  }
  const port = parseInt(match[3], 10);
  if (port > 65535) {
    throw new ConfigError(`Invalid bind port: ${match[3]}`);
  }
  return { host: match[1] ?? (match[2] || "0.0.0.0"), port };
}

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const result = schema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;

  let accounts: AccountBackendConfig;
  if (parsed.ACCOUNT_BACKEND === "api") {
    if (!parsed.ACCOUNT_API_ENDPOINT) {
      throw new ConfigError("ACCOUNT_API_ENDPOINT is required when ACCOUNT_BACKEND=api");
    }
    accounts = {
      kind: "api",
      endpoint: parsed.ACCOUNT_API_ENDPOINT,
      secret: parsed.ACCOUNT_API_SECRET || undefined,
    };
  } else {
    accounts = { kind: "file", accountsPath: parsed.ACCOUNTS_PATH };
  }

  const nameservers = parsed.UPSTREAM_NAMESERVERS.split(",")
    .map((server) => server.trim())
    .filter(Boolean);
  if (nameservers.length === 0) {
    throw new ConfigError("UPSTREAM_NAMESERVERS must name at least one resolver");
  }

  const { host, port } = parseBindAddress(
    parsed.BIND_ADDRESS || parsed.YGG_BIND_ADDRESS || "0.0.0.0:3000"
  );

  return {
    host,
    port,
    accounts,
    sessionsPath: parsed.SESSIONS_PATH,
    upstreamHost: parsed.UPSTREAM_HOST,
    upstreamNameservers: nameservers,
    upstreamTimeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
  };
}

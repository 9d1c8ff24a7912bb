import { Logger } from "@nestjs/common";
import { readPowerDnsApiKey } from "./api-key";

export const APP_CONFIG_TOKEN = "APP_CONFIG";

export interface PowerDnsApiConfig {
  baseUrl: string;
  apiKey?: string;
  serverId: string;
  timeoutMs: number;
}

export interface AppConfig {
  powerdns: PowerDnsApiConfig;
  dnssec: { enabled: boolean };
  misc: {
    /** Keep A/AAAA and PTR comments in step. */
    recordCommentsSync: boolean;
  };
  dns: { defaultTtl: number };
}

const DEFAULT_API_URL = "http://127.0.0.1:8081";
const DEFAULT_SERVER_ID = "localhost";
const DEFAULT_TTL = 86400;
const DEFAULT_TIMEOUT_MS = 30_000;

const logger = new Logger("AppConfig");

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean {
  const value = env[key]?.trim().toLowerCase();
  return value === "true" || value === "1" || value === "yes";
}

function readNonNegativeInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    logger.warn(`Ignoring ${key}="${raw}" (expected a non-negative integer).`);
    return fallback;
  }
  return Number.parseInt(raw, 10);
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const baseUrl = (env.POWERDNS_API_URL?.trim() || DEFAULT_API_URL).replace(
    /\/+$/,
    "",
  );
  const apiKey = readPowerDnsApiKey(env);

  return {
    powerdns: {
      baseUrl,
      apiKey,
      serverId: env.POWERDNS_SERVER_ID?.trim() || DEFAULT_SERVER_ID,
      timeoutMs: readNonNegativeInteger(
        env,
        "POWERDNS_API_TIMEOUT_MS",
        DEFAULT_TIMEOUT_MS,
      ),
    },
    dnssec: { enabled: readBoolean(env, "DNSSEC_ENABLED") },
    misc: { recordCommentsSync: readBoolean(env, "RECORD_COMMENTS_SYNC") },
    dns: {
      defaultTtl: readNonNegativeInteger(env, "DNS_DEFAULT_TTL", DEFAULT_TTL),
    },
  };
}

export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  /** Set when `HTTPS_ENABLED=true`. */
  https?: { certPath: string; keyPath: string };
  /** Take the client address from `X-Forwarded-For`. */
  trustProxy: boolean;
}

const DEFAULT_PORT = 3000;

export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const corsOrigins = (env.CORS_ORIGINS ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  let https: ServerConfig["https"];
  if (readBoolean(env, "HTTPS_ENABLED")) {
    const certPath = env.HTTPS_CERT_PATH?.trim();
    const keyPath = env.HTTPS_KEY_PATH?.trim();
    if (!certPath || !keyPath) {
      throw new Error(
        "HTTPS_ENABLED=true requires both HTTPS_CERT_PATH and HTTPS_KEY_PATH.",
      );
    }
    https = { certPath, keyPath };
  }

  return {
    port: readNonNegativeInteger(env, "PORT", DEFAULT_PORT),
    corsOrigins,
    https,
    trustProxy: readBoolean(env, "TRUST_PROXY"),
  };
}

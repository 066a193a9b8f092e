import { z } from "zod";
import { ConfigError } from "../errors/errors.js";

// Environment variables read at startup:
//   RELAY_API_ENDPOINT  backend streaming chat URL (required to send requests)
//   RELAY_DEVICE_ID     device identifier, sent as `device-id` and signed
//   RELAY_OS_TYPE       `os-type` header value
//   RELAY_SID           session id, sent as `sid`
//   RELAY_SIGNER_MODULE path to the signing module (.wasm or .wat)
//   RELAY_UTF8_MODE     "strict" (fail on a character split across chunks) or "incremental"
//   RELAY_DEFAULT_MODEL model name reported in chunks when the request names none
//   LOG_LEVEL           pino level

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const UTF8_MODES = ["strict", "incremental"] as const;
export type Utf8Mode = (typeof UTF8_MODES)[number];

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length === 0 ? undefined : value))
  .optional();

const envSchema = z.object({
  RELAY_API_ENDPOINT: optionalText.pipe(z.string().url().optional()),
  RELAY_DEVICE_ID: optionalText,
  RELAY_OS_TYPE: z.string().trim().min(1).default("3"),
  RELAY_SID: optionalText,
  RELAY_SIGNER_MODULE: z.string().trim().min(1).default("./sign_bg.wasm"),
  RELAY_UTF8_MODE: z.enum(UTF8_MODES).default("strict"),
  RELAY_DEFAULT_MODEL: z.string().trim().min(1).default("unknown-model"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface RelayConfig {
  apiEndpoint?: string;
  deviceId?: string;
  osType: string;
  sid?: string;
  signerModulePath: string;
  utf8Mode: Utf8Mode;
  defaultModel: string;
  logLevel: LogLevel;
}

/** The subset of configuration needed to sign and send a backend request. */
export interface BackendIdentity {
  apiEndpoint: string;
  deviceId: string;
  osType: string;
  sid: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  return {
    apiEndpoint: values.RELAY_API_ENDPOINT,
    deviceId: values.RELAY_DEVICE_ID,
    osType: values.RELAY_OS_TYPE,
    sid: values.RELAY_SID,
    signerModulePath: values.RELAY_SIGNER_MODULE,
    utf8Mode: values.RELAY_UTF8_MODE,
    defaultModel: values.RELAY_DEFAULT_MODEL,
    logLevel: values.LOG_LEVEL,
  };
}

export function requireBackendIdentity(config: RelayConfig): BackendIdentity {
  const missing: string[] = [];
  if (!config.apiEndpoint) missing.push("RELAY_API_ENDPOINT is not set");
  if (!config.deviceId) missing.push("RELAY_DEVICE_ID is not set");
  if (!config.sid) missing.push("RELAY_SID is not set");
  if (!config.apiEndpoint || !config.deviceId || !config.sid) {
    throw new ConfigError(missing);
  }
  return {
    apiEndpoint: config.apiEndpoint,
    deviceId: config.deviceId,
    osType: config.osType,
    sid: config.sid,
  };
}

/**
 * Configuration management for changedoc
 * Handles loading, validation, and decryption of user config, plus the
 * numeric pipeline settings every submission is checked against.
 */

import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import crypto from "node:crypto";
import { ConfigurationError } from "./errors";

export interface LlmKeys {
  anthropic?: string;
  openai?: string;
  gemini?: string;
}

export type LlmProvider = "openai" | "anthropic" | "google";

export interface PipelineSettings {
  /** Upper bound on a modified-code chunk body, in characters. */
  maxChunkSize: number;
  /** Characters of the previous chunk repeated ahead of the next one. */
  overlap: number;
  /** Upper bound on original-file context per chunk, in characters. */
  maxContextSize: number;
  /** Upper bound on a whole prompt unit, in characters. */
  promptUnitBudget: number;
  /** In-flight analysis calls per submission. */
  concurrency: number;
  /** Extra attempts after a failed analysis call. */
  retryLimit: number;
  timeoutMs: number;
  backoffMs: number;
}

export interface ChangedocConfigV1 {
  schemaVersion: 1;
  llm: {
    analyst: string;
    keys: LlmKeys;
  };
  pipeline: Partial<PipelineSettings>;
}

export const CONFIG_PATH = path.join(os.homedir(), ".changedoc", "config.json");

export const DEFAULT_ANALYST_MODEL = "openai/gpt-4o-mini";

// ~2000-char chunks keep a unit well inside an 8k-token context window.
export const DEFAULT_PIPELINE_SETTINGS: Readonly<PipelineSettings> = Object.freeze({
  maxChunkSize: 2000,
  overlap: 200,
  maxContextSize: 5000,
  promptUnitBudget: 12000,
  concurrency: 2,
  retryLimit: 2,
  timeoutMs: 120_000,
  backoffMs: 1000,
});

const SETTING_KEYS: ReadonlyArray<keyof PipelineSettings> = [
  "maxChunkSize",
  "overlap",
  "maxContextSize",
  "promptUnitBudget",
  "concurrency",
  "retryLimit",
  "timeoutMs",
  "backoffMs",
];

const SECRET_KEY = crypto.scryptSync("changedoc-local-key", "salt", 32);

interface EncryptedSecret {
  iv: string;
  content: string;
  tag: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Very light AES-256-GCM encryption helper, returns the JSON string stored
 * in the config file.
 */
export function encryptSecret(secret: string): string {
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv("aes-256-gcm", SECRET_KEY, iv);
  const enc = Buffer.concat([cipher.update(secret, "utf8"), cipher.final()]);
  const payload: EncryptedSecret = {
    iv: iv.toString("hex"),
    content: enc.toString("hex"),
    tag: cipher.getAuthTag().toString("hex"),
  };
  return JSON.stringify(payload);
}

/**
 * Decrypt an encrypted secret stored as JSON
 */
export function decryptSecret(encryptedData: string): string {
  const parsed: unknown = JSON.parse(encryptedData);
  if (
    !isRecord(parsed) ||
    typeof parsed.iv !== "string" ||
    typeof parsed.content !== "string" ||
    typeof parsed.tag !== "string"
  ) {
    throw new Error("Malformed encrypted secret");
  }
  const decipher = crypto.createDecipheriv("aes-256-gcm", SECRET_KEY, Buffer.from(parsed.iv, "hex"));
  decipher.setAuthTag(Buffer.from(parsed.tag, "hex"));
  const decrypted = Buffer.concat([
    decipher.update(Buffer.from(parsed.content, "hex")),
    decipher.final(),
  ]);
  return decrypted.toString("utf8");
}

/**
 * Keep only known numeric settings from an untrusted object.
 */
function pickSettings(raw: unknown): Partial<PipelineSettings> {
  const picked: Partial<PipelineSettings> = {};
  if (!isRecord(raw)) return picked;
  for (const key of SETTING_KEYS) {
    const value = raw[key];
    if (typeof value === "number") picked[key] = value;
  }
  return picked;
}

/**
 * Load and validate changedoc configuration
 * @throws {Error} if config is missing or invalid
 */
export function loadConfig(configPath: string = CONFIG_PATH): ChangedocConfigV1 {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(
      `changedoc not configured. Run 'changedoc init' to set up your configuration.`,
      `Expected config at: ${configPath}`,
    );
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Invalid config file at ${configPath}. Please run 'changedoc init' to recreate.`,
      error instanceof Error ? error.message : String(error),
    );
  }

  if (!isRecord(rawConfig) || rawConfig.schemaVersion !== 1) {
    const version = isRecord(rawConfig) ? String(rawConfig.schemaVersion) : "unknown";
    throw new ConfigurationError(
      `Unsupported config schema version ${version}. Please run 'changedoc init' to upgrade.`,
    );
  }

  const llm = isRecord(rawConfig.llm) ? rawConfig.llm : {};

  // Decrypt API keys
  const decryptedKeys: LlmKeys = {};
  if (isRecord(llm.keys)) {
    for (const provider of ["anthropic", "openai", "gemini"] as const) {
      const encryptedKey = llm.keys[provider];
      if (encryptedKey && typeof encryptedKey === "string") {
        try {
          decryptedKeys[provider] = decryptSecret(encryptedKey);
        } catch {
          console.warn(`Failed to decrypt ${provider} API key. You may need to run 'changedoc init' again.`);
        }
      }
    }
  }

  return {
    schemaVersion: 1,
    llm: {
      analyst: typeof llm.analyst === "string" && llm.analyst ? llm.analyst : DEFAULT_ANALYST_MODEL,
      keys: decryptedKeys,
    },
    pipeline: pickSettings(rawConfig.pipeline),
  };
}

/**
 * Map a model id ("openai/gpt-4o-mini") to the key slot and provider.
 */
export function providerOf(model: string): LlmProvider {
  const prefix = model.split("/")[0];
  if (prefix === "openai" || prefix === "anthropic" || prefix === "google") {
    return prefix;
  }
  throw new ConfigurationError(`Unsupported LLM provider: ${prefix}`, `model: ${model}`);
}

/**
 * Get API key for a specific provider
 * @throws {ConfigurationError} if key is missing
 */
export function getApiKey(provider: keyof LlmKeys, config: ChangedocConfigV1 = loadConfig()): string {
  const key = config.llm.keys[provider];

  if (!key) {
    throw new ConfigurationError(
      `${provider} API key not found. Please run 'changedoc init' to configure your API keys.`,
    );
  }

  return key;
}

/**
 * Get the configured analyst model
 */
export function getModel(config: ChangedocConfigV1 = loadConfig()): string {
  return config.llm.analyst;
}

/**
 * Check if config exists and is valid (non-throwing)
 */
export function isConfigured(configPath: string = CONFIG_PATH): boolean {
  try {
    loadConfig(configPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Layer partial settings over the defaults; later layers win and undefined
 * values never override.
 */
export function resolvePipelineSettings(
  ...layers: Array<Partial<PipelineSettings> | undefined>
): PipelineSettings {
  const resolved: PipelineSettings = { ...DEFAULT_PIPELINE_SETTINGS };
  for (const layer of layers) {
    if (!layer) continue;
    for (const key of SETTING_KEYS) {
      const value = layer[key];
      if (value !== undefined) resolved[key] = value;
    }
  }
  return resolved;
}

/**
 * Fail fast on settings the pipeline cannot honour.
 * @throws {ConfigurationError}
 */
const ZERO_ALLOWED_KEYS: ReadonlySet<keyof PipelineSettings> = new Set<keyof PipelineSettings>([
  "overlap",
  "retryLimit",
  "backoffMs",
]);

export function validatePipelineSettings(settings: PipelineSettings): void {
  const problems: string[] = [];

  for (const key of SETTING_KEYS) {
    const value = settings[key];
    const zeroAllowed = ZERO_ALLOWED_KEYS.has(key);
    if (!Number.isInteger(value)) {
      problems.push(`${key} must be an integer (got ${value})`);
    } else if (zeroAllowed ? value < 0 : value <= 0) {
      problems.push(`${key} must be ${zeroAllowed ? "zero or positive" : "positive"} (got ${value})`);
    }
  }

  if (problems.length === 0) {
    if (settings.overlap >= settings.maxChunkSize) {
      problems.push(`overlap (${settings.overlap}) must be smaller than maxChunkSize (${settings.maxChunkSize})`);
    }
    if (settings.promptUnitBudget < settings.maxChunkSize + settings.overlap) {
      problems.push(
        `promptUnitBudget (${settings.promptUnitBudget}) cannot hold a full chunk with overlap (${settings.maxChunkSize + settings.overlap})`,
      );
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError("Invalid pipeline settings", problems.join("; "));
  }
}

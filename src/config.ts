import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import path from "path";
import { DEFAULT_BASE_URL, DEFAULT_MODEL } from "../llm/ModelDefaults";

export type Env = Record<string, string | undefined>;

export const ACCESS_TOKEN_ENV_NAMES = [
  "NVIDIA_BUILD_AI_ACCESS_TOKEN",
  "NVIDIA_ACCESS_TOKEN",
  "ACCESS_TOKEN",
  "NVIDIA_API_KEY",
  "API_KEY",
];

export interface NvchatConfig {
  baseUrl?: string;
  model?: string;
  accessToken?: string;
}

export function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return path.join(homedir(), p.slice(2));
  return p;
}

export function configFilePath(env: Env = process.env): string {
  const override = env.NVCHAT_CONFIG?.trim();
  if (override) return expandHome(override);
  return path.join(homedir(), ".config", "nvchat.json");
}

function trimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeConfig(source: unknown): NvchatConfig {
  if (!isRecord(source)) return {};
  const baseUrl = trimmedString(source.baseUrl);
  return {
    baseUrl: baseUrl ? baseUrl.replace(/\/+$/, "") : undefined,
    model: trimmedString(source.model),
    accessToken: trimmedString(source.accessToken),
  };
}

export function readConfig(file: string = configFilePath()): NvchatConfig {
  try {
    if (!existsSync(file)) return {};
    const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
    return normalizeConfig(parsed);
  } catch {
    return {};
  }
}

export function writeConfig(config: NvchatConfig, file: string = configFilePath()): void {
  mkdirSync(path.dirname(file), { recursive: true });
  const clean = normalizeConfig(config);
  writeFileSync(file, `${JSON.stringify(clean, null, 2)}\n`, { mode: 0o600 });
}

export function updateConfig(updater: (current: NvchatConfig) => NvchatConfig, file: string = configFilePath()): void {
  writeConfig(updater(readConfig(file)), file);
}

export function setConfiguredModel(model: string, file?: string): void {
  updateConfig((current) => ({ ...current, model }), file);
}

export function setConfiguredAccessToken(accessToken: string, file?: string): void {
  updateConfig((current) => ({ ...current, accessToken }), file);
}

export function accessTokenFromEnv(env: Env = process.env): string | undefined {
  for (const name of ACCESS_TOKEN_ENV_NAMES) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

export function resolveAccessToken(flag: string | undefined, env: Env = process.env, config: NvchatConfig = readConfig()): string | undefined {
  if (flag) return flag;
  return accessTokenFromEnv(env) || config.accessToken;
}

export function resolveBaseUrl(env: Env = process.env, config: NvchatConfig = readConfig()): string {
  const raw = env.NVCHAT_BASE_URL?.trim() || config.baseUrl || DEFAULT_BASE_URL;
  return raw.replace(/\/+$/, "");
}

export function resolveModel(flag: string | undefined, env: Env = process.env, config: NvchatConfig = readConfig()): string {
  return flag?.trim() || env.NVCHAT_MODEL?.trim() || config.model || DEFAULT_MODEL;
}

export function historyDir(env: Env = process.env): string {
  const explicit = env.NVCHAT_HISTORY_DIR?.trim();
  if (explicit) return expandHome(explicit);
  const cache = env.XDG_CACHE_HOME?.trim();
  if (cache) return path.join(expandHome(cache), "nvchat");
  return path.join(homedir(), ".cache", "nvchat");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function conversationTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}-${time}`;
}

export function defaultConversationPath(now: Date = new Date(), env: Env = process.env): string {
  return path.join(historyDir(env), `conversation-${conversationTimestamp(now)}.json`);
}

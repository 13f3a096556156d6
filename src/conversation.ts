import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import path from "path";
import type { ChatMessage, ConversationFile, EffectiveSettings, ModelSettings, Role, StoredModelSettings } from "../llm/Interfaces";
import {
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_MODEL,
  DEFAULT_STREAM,
  FALLBACK_MODEL_KEY,
  getModelDefinition,
  parameterDefaults,
} from "../llm/ModelDefaults";

export class ConversationFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversationFileError";
  }
}

export class ConversationLimitError extends Error {
  readonly count: number;
  readonly limit: number;

  constructor(message: string, count: number, limit: number) {
    super(message);
    this.name = "ConversationLimitError";
    this.count = count;
    this.limit = limit;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface SeedOptions {
  stream?: boolean;
  historyLimit?: number;
}

/** A fresh conversation; `stream` and `history_limit` take the values in force when it is created. */
export function seedConversation({ stream = DEFAULT_STREAM, historyLimit = DEFAULT_HISTORY_LIMIT }: SeedOptions = {}): ConversationFile {
  return {
    system: "",
    settings: {
      stream,
      history_limit: historyLimit,
      default: parameterDefaults(getModelDefinition(FALLBACK_MODEL_KEY)),
      models: {
        [DEFAULT_MODEL]: {
          temperature: 1,
          top_p: 1,
          frequency_penalty: 0,
          presence_penalty: 0,
          max_tokens: 4096,
          reasoning_effort: "low",
        },
      },
    },
    messages: [],
  };
}

// Structural check done before a file is trusted; failures trigger a backup.
export function hasRequiredFields(parsed: unknown): boolean {
  if (!isRecord(parsed) || !Array.isArray(parsed.messages)) return false;
  const settings = parsed.settings;
  return isRecord(settings) && isRecord(settings.default) && isRecord(settings.models);
}

function normalizeModelSettings(raw: unknown): StoredModelSettings {
  return isRecord(raw) ? { ...raw } : {};
}

// Every entry is kept so a rewrite never loses messages written by other tools.
function normalizeMessages(raw: unknown): ChatMessage[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((entry): ChatMessage => {
    const record = isRecord(entry) ? entry : {};
    return {
      role: typeof record.role === "string" ? record.role : "",
      content: typeof record.content === "string" ? record.content : "",
    };
  });
}

export function normalizeConversation(parsed: unknown): ConversationFile {
  if (!isRecord(parsed)) throw new ConversationFileError("conversation file is not a JSON object");
  const settings: Record<string, unknown> = isRecord(parsed.settings) ? parsed.settings : {};
  const models: Record<string, StoredModelSettings> = {};
  if (isRecord(settings.models)) {
    for (const [id, value] of Object.entries(settings.models)) {
      models[id] = normalizeModelSettings(value);
    }
  }
  return {
    system: typeof parsed.system === "string" ? parsed.system : "",
    settings: {
      stream: typeof settings.stream === "boolean" ? settings.stream : DEFAULT_STREAM,
      history_limit: typeof settings.history_limit === "number" ? settings.history_limit : DEFAULT_HISTORY_LIMIT,
      default: normalizeModelSettings(settings.default),
      models,
    },
    messages: normalizeMessages(parsed.messages),
  };
}

export function writeConversation(file: string, conversation: ConversationFile): void {
  const tmp = `${file}.tmp`;
  writeFileSync(tmp, `${JSON.stringify(conversation, null, 2)}\n`);
  renameSync(tmp, file);
}

export function readConversation(file: string): ConversationFile {
  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConversationFileError(`Failed reading conversation file ${file}: ${msg}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConversationFileError(`Conversation file ${file} is not valid JSON`);
  }
  return normalizeConversation(parsed);
}

export interface EnsureConversationOptions {
  seed?: ConversationFile;
  warn?: (message: string) => void;
  now?: () => Date;
}

export interface EnsureConversationResult {
  created: boolean;
  backup?: string;
}

/**
 * Creates the file (and its directory) when missing. A file that is not JSON
 * or lacks the required fields is moved to `<file>.bak.<unix-seconds>` and
 * replaced with a fresh seed.
 */
export function ensureConversationFile(file: string, opts: EnsureConversationOptions = {}): EnsureConversationResult {
  const seed = opts.seed ?? seedConversation();
  const warn = opts.warn ?? ((message: string) => console.error(message));
  mkdirSync(path.dirname(file), { recursive: true });

  if (!existsSync(file)) {
    writeConversation(file, seed);
    return { created: true };
  }

  let problem: "malformed" | "missing required fields" | undefined;
  try {
    const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
    if (!hasRequiredFields(parsed)) problem = "missing required fields";
  } catch {
    problem = "malformed";
  }
  if (!problem) return { created: false };

  const seconds = Math.floor((opts.now ?? (() => new Date()))().getTime() / 1000);
  const backup = `${file}.bak.${seconds}`;
  renameSync(file, backup);
  const detail = problem === "malformed" ? "was malformed" : "was missing required fields";
  warn(`Warning: Conversation file at ${file} ${detail}. Backed up to ${backup} and creating a new one.`);
  writeConversation(file, seed);
  return { created: true, backup };
}

export function appendMessage(file: string, role: Role, content: string): void {
  const conversation = readConversation(file);
  conversation.messages.push({ role, content });
  writeConversation(file, conversation);
}

export function messageCount(file: string): number {
  return readConversation(file).messages.length;
}

export function clearMessages(file: string): void {
  const conversation = readConversation(file);
  conversation.messages = [];
  writeConversation(file, conversation);
}

export function persistSystem(file: string, content: string): void {
  const conversation = readConversation(file);
  conversation.system = content;
  writeConversation(file, conversation);
}

/** Stores the active model's typed parameters (nulls skipped) and the global settings. */
export function persistSettings(file: string, settings: EffectiveSettings): void {
  const conversation = readConversation(file);
  const stored: ModelSettings = {};
  for (const [name, value] of Object.entries(settings.params)) {
    if (value !== null) stored[name] = value;
  }
  conversation.settings.models[settings.model] = stored;
  conversation.settings.stream = settings.stream;
  conversation.settings.history_limit = settings.historyLimit;
  writeConversation(file, conversation);
}

export function copyConversation(src: string, dst: string): void {
  const dir = path.dirname(dst);
  if (dir && !existsSync(dir)) mkdirSync(dir, { recursive: true });
  copyFileSync(src, dst);
}

export function limitReachedMessage(file: string, count: number, limit: number): string {
  return [
    "Conversation message limit reached.",
    `File: ${file}`,
    `Messages in file: ${count}`,
    `Configured limit: ${limit}`,
    "",
    "This program will NOT remove or rotate messages automatically.",
    "Options:",
    "  - Increase limit via -L option and re-run",
    "  - Use a different conversation file (pass new filename)",
    "  - Manually edit the file to remove old messages",
  ].join("\n");
}

/** Startup check: a file already at the limit is refused. */
export function assertBelowLimit(file: string, limit: number): number {
  const count = messageCount(file);
  if (count >= limit) {
    throw new ConversationLimitError(limitReachedMessage(file, count, limit), count, limit);
  }
  return count;
}

/** After a user message is appended, going over the limit is an error. */
export function assertWithinLimit(file: string, limit: number): number {
  const count = messageCount(file);
  if (count > limit) {
    throw new ConversationLimitError(
      `After adding your message, the conversation file exceeded the limit (${limit}).\nI did not remove messages. Increase limit with -L or use another file.`,
      count,
      limit,
    );
  }
  return count;
}

import type { EffectiveSettings } from "../llm/Interfaces";
import { getModelDefinition } from "../llm/ModelDefaults";
import { APIError, sendChatCompletion, type ChatResult } from "../llm/chat_api";
import { buildPayload, describePayload } from "../llm/payload";
import type { DisplayEvent } from "../llm/stream";
import { REASONING_BEGIN, REASONING_END, buildRequestMessages, quietRequestMessages, resolveSystemPrompt } from "../prompt";
import { ConversationFileError, ConversationLimitError, appendMessage, assertWithinLimit, readConversation } from "./conversation";
import { SettingsError } from "./settings";
import { GREEN_TEXT, colorize, logDebug } from "./ui/terminal";

export interface Connection {
  baseUrl: string;
  accessToken: string;
  fetch?: typeof fetch;
}

export type Write = (text: string) => void;

/** Text of a typed message as it is sent and stored, or undefined when only whitespace was entered. */
export function userMessage(raw: string): string | undefined {
  const text = raw.trim();
  return text.length > 0 ? text : undefined;
}

/** One-line report for a failed turn or request. */
export function describeTurnError(error: unknown): string {
  if (error instanceof ConversationLimitError || error instanceof ConversationFileError || error instanceof SettingsError) {
    return error.message;
  }
  if (error instanceof APIError) return `API error: ${error.message}`;
  const msg = error instanceof Error ? error.message : String(error);
  return `Error: request failed: ${msg}`;
}

/** Terminal rendering of a reply: reasoning between green markers, then content. */
export function createReplyPrinter(write: Write, color: boolean): (event: DisplayEvent) => void {
  return (event) => {
    switch (event.kind) {
      case "reasoning-start":
        write(`\n${colorize(GREEN_TEXT, REASONING_BEGIN, color)}\n`);
        break;
      case "reasoning-end":
        write(`\n${colorize(GREEN_TEXT, REASONING_END, color)}\n\n`);
        break;
      case "reasoning":
      case "content":
        write(event.text);
        break;
    }
  };
}

export function createQuietPrinter(write: Write): (event: DisplayEvent) => void {
  return (event) => {
    if (event.kind === "content") write(event.text);
  };
}

export interface TurnOptions {
  connection: Connection;
  conversationPath: string;
  settings: EffectiveSettings;
  sysPromptContent?: string;
  write: Write;
  color?: boolean;
  signal?: AbortSignal;
}

/**
 * Full turn against a conversation file: the user message is appended and
 * the limit re-checked before the request; the reply is appended when any
 * text came back, partial text from a stopped stream included.
 */
export async function runTurn(userInput: string, opts: TurnOptions): Promise<ChatResult> {
  appendMessage(opts.conversationPath, "user", userInput);
  assertWithinLimit(opts.conversationPath, opts.settings.historyLimit);

  const conversation = readConversation(opts.conversationPath);
  const definition = getModelDefinition(opts.settings.model);
  const messages = buildRequestMessages({
    definition,
    settings: opts.settings,
    system: resolveSystemPrompt(opts.sysPromptContent, conversation.system),
    history: conversation.messages,
  });
  const payload = buildPayload(opts.settings, messages, definition);
  logDebug("payload", describePayload(payload));

  const result = await sendChatCompletion({
    baseUrl: opts.connection.baseUrl,
    accessToken: opts.connection.accessToken,
    fetch: opts.connection.fetch,
    payload,
    signal: opts.signal,
    onEvent: createReplyPrinter(opts.write, opts.color ?? false),
  });

  if (!result.stopped && result.rawBody !== undefined && result.text === "") {
    // Nothing recognisable in a non-streaming body: show it as is.
    opts.write(`${result.rawBody}\n`);
    return result;
  }
  if (result.text.length > 0) {
    appendMessage(opts.conversationPath, "assistant", result.text);
  }
  opts.write("\n");
  return result;
}

export interface QuietTurnOptions {
  connection: Connection;
  settings: EffectiveSettings;
  sysPromptContent?: string;
  write: Write;
}

/** One-shot prompt without a conversation file: only the reply content is printed. */
export async function runQuietTurn(userInput: string, opts: QuietTurnOptions): Promise<ChatResult> {
  const definition = getModelDefinition(opts.settings.model);
  const messages = quietRequestMessages(opts.sysPromptContent ?? "", userInput);
  const payload = buildPayload(opts.settings, messages, definition);
  logDebug("payload", describePayload(payload));

  const result = await sendChatCompletion({
    baseUrl: opts.connection.baseUrl,
    accessToken: opts.connection.accessToken,
    fetch: opts.connection.fetch,
    payload,
    onEvent: createQuietPrinter(opts.write),
  });
  if (result.rawBody !== undefined && !result.hasContent) {
    opts.write(result.rawBody);
  }
  // Single trailing newline keeps piped output clean.
  opts.write("\n");
  return result;
}

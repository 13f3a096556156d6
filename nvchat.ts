#!/usr/bin/env tsx
import { existsSync, readFileSync } from "fs";
import type { EffectiveSettings, StoredSettings } from "./llm/Interfaces";
import { formatModelInfo, getModelDefinition, hasModelDefinition, listModelIds } from "./llm/ModelDefaults";
import { fetchModels } from "./llm/providers/nvidia";
import { parseCli, envOverrides, resolvePromptInput, type CliOptions } from "./src/cli";
import { handleCommand, type CommandIO, type SessionState } from "./src/commands";
import {
  defaultConversationPath,
  expandHome,
  historyDir,
  readConfig,
  resolveAccessToken,
  resolveBaseUrl,
  resolveModel,
  setConfiguredAccessToken,
  setConfiguredModel,
} from "./src/config";
import {
  ConversationLimitError,
  assertBelowLimit,
  ensureConversationFile,
  persistSettings,
  persistSystem,
  readConversation,
  seedConversation,
} from "./src/conversation";
import { SettingsError, formatSettingsBanner, resolveSettings, validateSettings, type SettingOverrides } from "./src/settings";
import { describeTurnError, runQuietTurn, runTurn, userMessage, type Connection } from "./src/session";
import { formatModelList, usageText } from "./src/ui/help";
import { listenForStop, promptForInput, readAllStdin } from "./src/ui/input";
import { runModelPicker } from "./src/ui/model-picker";
import {
  DISCLAIMER,
  blue,
  bold,
  colorEnabled,
  dim,
  green,
  logError,
  logInfo,
  logSuccess,
} from "./src/ui/terminal";

process.on("SIGINT", () => {
  process.stderr.write("\n");
  process.exit(130);
});

const writeStdout = (text: string) => {
  process.stdout.write(text);
};

function fail(message: string): never {
  logError(message);
  process.exit(1);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isInteractiveTerminal(): boolean {
  return Boolean(process.stdin.isTTY && process.stderr.isTTY);
}

async function promptForAccessToken(): Promise<string | undefined> {
  logInfo(`${dim("No access token found. Paste one to store it in ~/.config/nvchat.json, or press Enter to skip.")}`);
  const result = await promptForInput(`${bold("Access token")}: `, { singleLine: true });
  if (result.kind !== "line") return undefined;
  const token = result.value.trim();
  if (!token) return undefined;
  setConfiguredAccessToken(token);
  return token;
}

function readSystemPrompt(file: string | undefined): string | undefined {
  if (!file) return undefined;
  const resolved = expandHome(file);
  if (!existsSync(resolved)) fail(`System prompt file not found: ${file}`);
  return readFileSync(resolved, "utf-8");
}

function resolveAndValidate(model: string, file: StoredSettings | undefined, overrides: SettingOverrides): EffectiveSettings {
  try {
    const settings = resolveSettings({ model, file, overrides });
    validateSettings(settings);
    return settings;
  } catch (error) {
    if (error instanceof SettingsError) fail(error.message);
    throw error;
  }
}

// New files start from the stream and limit in force now (defaults, env, flags).
function ensureSeededConversation(conversationPath: string, model: string, overrides: SettingOverrides): void {
  const { stream, historyLimit } = resolveAndValidate(model, undefined, overrides);
  ensureConversationFile(conversationPath, { seed: seedConversation({ stream, historyLimit }) });
}

async function listRemote(connection: Connection): Promise<void> {
  const models = await fetchModels({ baseURL: connection.baseUrl, apiKey: connection.accessToken });
  for (const model of models) {
    writeStdout(`${model.id}${model.owned_by ? `  (${model.owned_by})` : ""}\n`);
  }
}

async function runPromptMode(opts: CliOptions, prompt: string, connection: Connection, model: string, overrides: SettingOverrides, sysPromptContent?: string) {
  const input = await resolvePromptInput(prompt, readAllStdin);
  if (opts.persistSystem && sysPromptContent === undefined) {
    fail("Persist system requested (-S) but no -s SYS_PROMPT_FILE provided. Provide -s path and -S together to persist system prompt into the conversation file.");
  }

  if (!opts.conversationFile) {
    const settings = resolveAndValidate(model, undefined, overrides);
    await runQuietTurn(input, { connection, settings, sysPromptContent, write: writeStdout });
    return;
  }

  const conversationPath = expandHome(opts.conversationFile);
  ensureSeededConversation(conversationPath, model, overrides);
  const settings = resolveAndValidate(model, readConversation(conversationPath).settings, overrides);
  if (opts.saveSettings) {
    persistSettings(conversationPath, settings);
    logSuccess(`Persisted current settings into ${conversationPath}`);
  }
  if (opts.persistSystem && sysPromptContent !== undefined) {
    persistSystem(conversationPath, sysPromptContent);
    logSuccess("Persisted system prompt into conversation file's .system");
  }
  await runTurn(input, {
    connection,
    conversationPath,
    settings,
    sysPromptContent,
    write: writeStdout,
    color: colorEnabled(process.stdout),
  });
}

async function runOneTurn(state: SessionState, input: string, connection: Connection, sysPromptContent: string | undefined): Promise<void> {
  logInfo(`\n${blue("Assistant:")}`);
  const controller = new AbortController();
  const detach = listenForStop(() => controller.abort());
  try {
    const result = await runTurn(input, {
      connection,
      conversationPath: state.conversationPath,
      settings: state.settings,
      sysPromptContent,
      write: writeStdout,
      color: colorEnabled(process.stdout),
      signal: controller.signal,
    });
    if (result.stopped) logInfo(dim("[stopped]"));
  } catch (error) {
    logError(describeTurnError(error));
  } finally {
    detach();
  }
}

function restoreStdinAfterInk(): void {
  const stdin = process.stdin;
  if (stdin.isTTY) stdin.setRawMode(false);
  stdin.ref();
  stdin.resume();
  stdin.setEncoding("utf8");
}

async function runInteractive(opts: CliOptions, connection: Connection, model: string, overrides: SettingOverrides, sysPromptContent?: string) {
  let conversationPath: string;
  if (opts.conversationFile) {
    conversationPath = expandHome(opts.conversationFile);
  } else {
    conversationPath = defaultConversationPath();
    logInfo(`Creating conversation file: ${conversationPath}`);
  }

  try {
    ensureSeededConversation(conversationPath, model, overrides);
  } catch (error) {
    fail(`Failed to setup conversation file: ${errorMessage(error)}`);
  }
  logInfo(`${green("Conversation file:")} ${conversationPath}`);

  const settings = resolveAndValidate(model, readConversation(conversationPath).settings, overrides);
  if (opts.persistSystem && sysPromptContent === undefined) {
    fail("Persist system requested (-S) but no -s SYS_PROMPT_FILE provided. Provide -s path and -S together to persist system prompt into the conversation file.");
  }

  try {
    assertBelowLimit(conversationPath, settings.historyLimit);
  } catch (error) {
    if (error instanceof ConversationLimitError) fail(`${error.message}\n\nExiting.`);
    throw error;
  }

  if (opts.saveSettings) {
    persistSettings(conversationPath, settings);
    logSuccess("Persisted current settings into conversation file's .settings");
  }
  if (opts.persistSystem && sysPromptContent !== undefined) {
    persistSystem(conversationPath, sysPromptContent);
    logSuccess("Persisted system prompt into conversation file's .system");
  }

  logInfo(`\n${DISCLAIMER}\n`);
  logInfo(`${bold("nvchat")} ${formatSettingsBanner(settings)}\n`);

  const state: SessionState = { conversationPath, settings, overrides };

  if (!process.stdin.isTTY) {
    const text = userMessage(await readAllStdin());
    if (text !== undefined) await runOneTurn(state, text, connection, sysPromptContent);
    return;
  }

  const io: CommandIO = {
    info: logInfo,
    success: logSuccess,
    error: logError,
    color: colorEnabled(process.stderr),
    listRemoteModels: () => fetchModels({ baseURL: connection.baseUrl, apiKey: connection.accessToken }),
    pickModel: async (current) => {
      const outcome = await runModelPicker({
        currentModel: current,
        builtInModels: listModelIds(),
        loadRemoteModels: () => fetchModels({ baseURL: connection.baseUrl, apiKey: connection.accessToken }),
      });
      restoreStdinAfterInk();
      return outcome.modelId || undefined;
    },
    rememberModel: setConfiguredModel,
  };

  while (true) {
    process.stderr.write("\n");
    const input = await promptForInput(`${blue("You")}: `);
    if (input.kind === "eof") {
      logInfo("Bye.");
      return;
    }
    const text = userMessage(input.value);
    if (text === undefined) continue;

    const outcome = await handleCommand(text, state, io);
    if (outcome === "exit") return;
    if (outcome === "handled") continue;
    await runOneTurn(state, text, connection, sysPromptContent);
  }
}

async function main() {
  const opts = parseCli(process.argv.slice(2));

  if (opts.help) {
    writeStdout(usageText(historyDir()));
    return;
  }
  if (opts.list) {
    writeStdout(formatModelList());
    return;
  }
  if (opts.modelInfo) {
    if (!hasModelDefinition(opts.modelInfo)) {
      logError(`Error: Model '${opts.modelInfo}' not found.`);
      logInfo("Use the -l flag to list all supported models.");
      process.exit(1);
    }
    writeStdout(formatModelInfo(opts.modelInfo, getModelDefinition(opts.modelInfo), colorEnabled(process.stdout)));
    return;
  }

  const config = readConfig();
  let accessToken = resolveAccessToken(opts.accessToken, process.env, config);
  if (!accessToken && opts.prompt === undefined && isInteractiveTerminal()) {
    accessToken = await promptForAccessToken();
  }
  if (!accessToken) {
    fail("No API key provided. Set NVIDIA_BUILD_AI_ACCESS_TOKEN or pass -k ACCESS_TOKEN");
  }
  const connection: Connection = { baseUrl: resolveBaseUrl(process.env, config), accessToken };

  if (opts.listRemote) {
    try {
      await listRemote(connection);
    } catch (error) {
      fail(describeTurnError(error));
    }
    return;
  }

  const model = resolveModel(opts.model, process.env, config);
  const overrides: SettingOverrides = { ...envOverrides(), ...opts.overrides };
  const sysPromptContent = readSystemPrompt(opts.sysPromptFile);

  if (opts.prompt !== undefined) {
    try {
      await runPromptMode(opts, opts.prompt, connection, model, overrides, sysPromptContent);
    } catch (error) {
      fail(describeTurnError(error));
    }
    return;
  }

  await runInteractive(opts, connection, model, overrides, sysPromptContent);
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.stack || error.message : String(error);
  logError(msg);
  process.exit(1);
});

import { existsSync, readFileSync } from "fs";
import type { EffectiveSettings, RemoteModel } from "../llm/Interfaces";
import { formatModelInfo, getModelDefinition, hasModelDefinition, randomModelId } from "../llm/ModelDefaults";
import {
  clearMessages,
  copyConversation,
  persistSettings,
  persistSystem,
  readConversation,
} from "./conversation";
import { exportLastN, exportNth } from "./export";
import {
  SettingsError,
  applySetting,
  isSettingName,
  switchModel,
  unsetSetting,
  type SettingOverrides,
} from "./settings";
import { INTERACTIVE_HELP } from "./ui/help";

export interface SessionState {
  conversationPath: string;
  settings: EffectiveSettings;
  overrides: SettingOverrides;
}

export interface CommandIO {
  info: (message: string) => void;
  success: (message: string) => void;
  error: (message: string) => void;
  listRemoteModels: () => Promise<RemoteModel[]>;
  // Interactive model picker; undefined when there is no TTY.
  pickModel?: (current: string) => Promise<string | undefined>;
  // Called with every model switched to, however it was chosen.
  rememberModel?: (model: string) => void;
  random?: () => number;
  color?: boolean;
}

export type CommandOutcome = "handled" | "exit" | "not-command";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Splits off a leading -t anywhere among the arguments.
export function parseExportArgs(args: string[]): { filter: boolean; rest: string[] } {
  const rest = args.filter((a) => a !== "-t");
  return { filter: rest.length !== args.length, rest };
}

function parsePositiveInt(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const n = Number.parseInt(raw, 10);
  return n > 0 ? n : undefined;
}

function changeModel(state: SessionState, model: string, io: CommandIO): void {
  const file = readConversation(state.conversationPath).settings;
  state.settings = switchModel(state.settings, model, file, state.overrides, (name, reason) => {
    io.error(`Ignoring ${name} for ${model}: ${reason}`);
  });
  io.rememberModel?.(model);
}

function runExport(name: string, args: string[], state: SessionState, io: CommandIO): void {
  const { filter, rest } = parseExportArgs(args);
  const needsCount = name !== "exportlast";
  if (rest.length < (needsCount ? 2 : 1)) {
    io.info(needsCount ? `Usage: /${name} [-t] <n> <file>` : "Usage: /exportlast [-t] <file>");
    return;
  }
  let n = 1;
  let target = rest[0];
  if (needsCount) {
    const parsed = parsePositiveInt(rest[0]);
    if (parsed === undefined) {
      io.error(`Invalid number: ${rest[0]}`);
      return;
    }
    n = parsed;
    target = rest[1];
  }
  try {
    const conversation = readConversation(state.conversationPath);
    if (name === "exportn") exportNth(n, conversation, target, filter);
    else exportLastN(n, conversation, target, filter);
    io.success(`Exported to ${target}`);
  } catch (error) {
    io.error(`Failed to export: ${errorMessage(error)}`);
  }
}

/**
 * Runs a slash command against the session. Input that is not a known
 * command comes back as "not-command" and is sent as a message.
 */
export async function handleCommand(input: string, state: SessionState, io: CommandIO): Promise<CommandOutcome> {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/")) return "not-command";
  const parts = trimmed.split(/\s+/);
  const name = parts[0].slice(1);
  const args = parts.slice(1);
  // Everything after the command word, spaces kept (stop strings).
  const rawValue = trimmed.slice(parts[0].length).trim();

  switch (name) {
    case "exit":
    case "quit":
      io.info("Bye.");
      return "exit";

    case "help":
      io.info(INTERACTIVE_HELP);
      return "handled";

    case "history":
      try {
        const raw = readFileSync(state.conversationPath, "utf-8");
        io.info(`${state.conversationPath}:\n${raw}`);
      } catch (error) {
        io.error(`Failed reading conversation: ${errorMessage(error)}`);
      }
      return "handled";

    case "clear":
      try {
        clearMessages(state.conversationPath);
        io.success("Messages cleared");
      } catch (error) {
        io.error(`Failed clearing messages: ${errorMessage(error)}`);
      }
      return "handled";

    case "save":
      if (args.length < 1) {
        io.info("Usage: /save <file>");
        return "handled";
      }
      try {
        copyConversation(state.conversationPath, args[0]);
        io.info(`Saved to ${args[0]}`);
      } catch (error) {
        io.error(`Failed to save: ${errorMessage(error)}`);
      }
      return "handled";

    case "persist-system": {
      if (args.length < 1) {
        io.info("Usage: /persist-system <file>");
        return "handled";
      }
      const source = args[0];
      if (!existsSync(source)) {
        io.error(`File not found: ${source}`);
        return "handled";
      }
      try {
        persistSystem(state.conversationPath, readFileSync(source, "utf-8"));
        io.success(`Persisted system prompt from ${source}`);
      } catch (error) {
        io.error(`Failed to persist system prompt: ${errorMessage(error)}`);
      }
      return "handled";
    }

    case "persist-settings":
      try {
        persistSettings(state.conversationPath, state.settings);
        io.success(`Persisted current settings to ${state.conversationPath}`);
      } catch (error) {
        io.error(`Failed to persist settings: ${errorMessage(error)}`);
      }
      return "handled";

    case "exportlast":
    case "exportlastn":
    case "exportn":
      runExport(name, args, state, io);
      return "handled";

    case "randomodel": {
      const model = randomModelId(io.random);
      try {
        changeModel(state, model, io);
        io.success(`Switched model to ${model}`);
      } catch (error) {
        io.error(errorMessage(error));
      }
      return "handled";
    }

    case "model": {
      let model: string | undefined = args[0];
      if (!model) {
        if (!io.pickModel) {
          io.info("Usage: /model <model_name>");
          return "handled";
        }
        model = await io.pickModel(state.settings.model);
        if (!model) return "handled";
      } else if (!hasModelDefinition(model)) {
        io.error(`Model '${model}' not found in the list of supported models.`);
        return "handled";
      }
      try {
        changeModel(state, model, io);
        io.success(`Model set to ${model}`);
      } catch (error) {
        io.error(errorMessage(error));
      }
      return "handled";
    }

    case "modelinfo": {
      if (args.length < 1) {
        io.info("Usage: /modelinfo <model_name>");
        return "handled";
      }
      const model = args[0];
      if (!hasModelDefinition(model)) {
        io.error(`Error: Model '${model}' not found.`);
        return "handled";
      }
      io.info(formatModelInfo(model, getModelDefinition(model), io.color ?? false).trimEnd());
      return "handled";
    }

    case "remote-models":
      try {
        const models = await io.listRemoteModels();
        io.info(models.length === 0 ? "The endpoint reported no models." : models.map((m) => `  ${m.id}`).join("\n"));
      } catch (error) {
        io.error(`Failed to list remote models: ${errorMessage(error)}`);
      }
      return "handled";
  }

  if (!isSettingName(state.settings, name)) return "not-command";

  if (!rawValue) {
    io.info(`Usage: /${name} <value> or /${name} unset`);
    return "handled";
  }
  try {
    if (rawValue === "unset") {
      state.settings = unsetSetting(state.settings, name);
      io.success(`${name} unset (reverted to default)`);
    } else {
      state.settings = applySetting(state.settings, name, rawValue);
      io.success(`${name} set to ${rawValue}`);
    }
  } catch (error) {
    if (error instanceof SettingsError) io.error(`Error: ${error.message}`);
    else throw error;
  }
  return "handled";
}

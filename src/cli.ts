import { Command, Option, type OptionValues } from "commander";
import { existsSync, readFileSync } from "fs";
import { allParameterNames } from "../llm/ModelDefaults";
import { historyDir, type Env } from "./config";
import type { SettingOverrides } from "./settings";
import { usageText } from "./ui/help";

export interface CliOptions {
  conversationFile?: string;
  model?: string;
  sysPromptFile?: string;
  persistSystem: boolean;
  saveSettings: boolean;
  accessToken?: string;
  prompt?: string;
  list: boolean;
  listRemote: boolean;
  modelInfo?: string;
  help: boolean;
  overrides: SettingOverrides;
}

// Parameters with a dedicated flag; every other registry parameter gets --<name-with-dashes>.
const DEDICATED_FLAGS: Array<{ flags: string; param: string; description: string }> = [
  { flags: "-T, --temperature <value>", param: "temperature", description: "sampling temperature" },
  { flags: "-P, --top-p <value>", param: "top_p", description: "top_p" },
  { flags: "-f, --frequency-penalty <value>", param: "frequency_penalty", description: "frequency penalty" },
  { flags: "-r, --presence-penalty <value>", param: "presence_penalty", description: "presence penalty" },
  { flags: "-M, --max-tokens <n>", param: "max_tokens", description: "max tokens to generate" },
  { flags: "--reasoning <effort>", param: "reasoning_effort", description: "reasoning effort" },
  { flags: "--reasoning-effort <effort>", param: "reasoning_effort", description: "alias of --reasoning" },
  { flags: "--stop <string>", param: "stop", description: "stop string" },
  { flags: "-L, --limit <n>", param: "history_limit", description: "conversation message limit" },
  { flags: "--history-limit <n>", param: "history_limit", description: "alias of --limit" },
];

function parameterFlags(): Array<{ option: Option; param: string }> {
  const dedicated = new Set(DEDICATED_FLAGS.map((f) => f.param));
  const options = DEDICATED_FLAGS.map((f) => ({ option: new Option(f.flags, f.description), param: f.param }));
  for (const name of allParameterNames()) {
    if (dedicated.has(name)) continue;
    options.push({ option: new Option(`--${name.replace(/_/g, "-")} <value>`, `model parameter ${name}`), param: name });
  }
  return options;
}

export function buildProgram(env: Env = process.env): { program: Command; params: Array<{ option: Option; param: string }> } {
  const params = parameterFlags();
  const program = new Command()
    .name("nvchat")
    .argument("[conversation_file]")
    .helpOption(false)
    .allowExcessArguments(false)
    .showHelpAfterError(usageText(historyDir(env)))
    .option("-m, --model <model>", "model id")
    .option("-s, --sys-prompt-file <file>", "system prompt file")
    .option("-S", "persist -s into the conversation file")
    .option("--save-settings", "persist current settings into the conversation file")
    .option("-k, --access-token <token>", "API key")
    .option("--prompt <input>", "one-shot prompt: text, a file, or - for stdin")
    .option("-l, --list", "list supported models")
    .option("--list-remote", "list models reported by the endpoint")
    .option("--modelinfo <name>", "show a model's parameters")
    .option("--stream <bool>", "enable or disable streaming")
    .option("--no-stream", "disable streaming")
    .option("-h, --help", "show help");
  for (const { option } of params) program.addOption(option);
  return { program, params };
}

function stringOption(values: OptionValues, key: string): string | undefined {
  const value: unknown = values[key];
  return typeof value === "string" ? value : undefined;
}

function flagOption(values: OptionValues, key: string): boolean {
  return values[key] === true;
}

/** NVCHAT_STREAM and NVCHAT_HISTORY_LIMIT, applied below command-line flags. */
export function envOverrides(env: Env = process.env): SettingOverrides {
  const overrides: SettingOverrides = {};
  if (env.NVCHAT_STREAM) overrides.stream = env.NVCHAT_STREAM;
  if (env.NVCHAT_HISTORY_LIMIT) overrides.history_limit = env.NVCHAT_HISTORY_LIMIT;
  return overrides;
}

/**
 * Parses user arguments (no node/script prefix). Commander reports unknown
 * options itself, prints the usage and exits 1.
 */
export function parseCli(argv: string[], configure: (program: Command) => void = () => {}, env: Env = process.env): CliOptions {
  const { program, params } = buildProgram(env);
  configure(program);
  program.parse(argv, { from: "user" });
  const values = program.opts();

  const overrides: SettingOverrides = {};
  for (const { option, param } of params) {
    const value = stringOption(values, option.attributeName());
    if (value !== undefined) overrides[param] = value;
  }
  const stream: unknown = values.stream;
  if (stream === false) overrides.stream = "false";
  else if (typeof stream === "string") overrides.stream = stream;

  const conversationFile: unknown = program.args[0];
  return {
    conversationFile: typeof conversationFile === "string" ? conversationFile : undefined,
    model: stringOption(values, "model"),
    sysPromptFile: stringOption(values, "sysPromptFile"),
    persistSystem: flagOption(values, "S"),
    saveSettings: flagOption(values, "saveSettings"),
    accessToken: stringOption(values, "accessToken"),
    prompt: stringOption(values, "prompt"),
    list: flagOption(values, "list"),
    listRemote: flagOption(values, "listRemote"),
    modelInfo: stringOption(values, "modelinfo"),
    help: flagOption(values, "help"),
    overrides,
  };
}

/** `--prompt` value: "-" reads stdin, an existing path reads the file, anything else is the text. */
export async function resolvePromptInput(value: string, readStdin: () => Promise<string>): Promise<string> {
  if (value === "-") return await readStdin();
  if (existsSync(value)) return readFileSync(value, "utf-8");
  return value;
}

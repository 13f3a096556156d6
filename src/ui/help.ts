import { DEFAULT_HISTORY_LIMIT, DEFAULT_MODEL, listModelIds } from "../../llm/ModelDefaults";

export const MODELS_URL = "https://build.nvidia.com/";

export function usageText(historyDir: string): string {
  return `Usage: nvchat [OPTIONS] [CONVERSATION_FILE]

If CONVERSATION_FILE is omitted, one is created at
  ${historyDir}/conversation-<timestamp>.json
and its path is printed.

Options:
  -m, --model MODEL             model id (default: ${DEFAULT_MODEL})
  -T, --temperature VALUE       sampling temperature
  -P, --top-p VALUE             top_p
  -f, --frequency-penalty VALUE frequency penalty
  -r, --presence-penalty VALUE  presence penalty
  -M, --max-tokens N            max tokens to generate
  -L, --limit N                 max messages allowed in the conversation file (default: ${DEFAULT_HISTORY_LIMIT})
  --reasoning EFFORT            reasoning effort: low | medium | high
  --stop STRING                 stop string (empty = omitted)
  --stream true|false           enable or disable streaming
  --no-stream                   disable streaming
  --<param> VALUE               any other model parameter, e.g. --thinking true, --seed 42
  -s, --sys-prompt-file FILE    system prompt file (content used for this run)
  -S                            persist -s into the conversation file's "system"
  --save-settings               persist the current settings into the conversation file
  --prompt TEXT|FILE|-          one-shot mode: print the reply for the prompt and exit
  -k, --access-token TOKEN      API key (overrides the environment)
  -l, --list                    list supported models and exit
  --list-remote                 list the models the endpoint reports and exit
  --modelinfo NAME              show a model's parameters and exit
  -h, --help                    show this help

Environment:
  NVIDIA_BUILD_AI_ACCESS_TOKEN, NVIDIA_ACCESS_TOKEN, ACCESS_TOKEN, NVIDIA_API_KEY, API_KEY
  NVCHAT_BASE_URL, NVCHAT_MODEL, NVCHAT_HISTORY_DIR, NVCHAT_CONFIG, NVCHAT_DEBUG, NO_COLOR

Input:
  Enter adds a new line, Ctrl+D sends. A line starting with / is sent on Enter.
  Esc stops a streaming reply. Ctrl+C exits.

For the full models list and details: ${MODELS_URL}
`;
}

export const INTERACTIVE_HELP = [
  "Available commands:",
  "  /exit, /quit: Exit the program",
  "  /history: Print full conversation JSON",
  "  /clear: Clear conversation messages",
  "  /save <file>: Save conversation to a new file",
  "  /persist-system <file>: Persist a system prompt from a file",
  "  /persist-settings: Save the current session's settings to the conversation file",
  "  /model [model_name]: Switch model (no name opens the picker)",
  "  /modelinfo <model_name>: Show a model's parameters",
  "  /remote-models: List the models the endpoint reports",
  "  /randomodel: Switch to a random model",
  "  /exportlast [-t] <file>: Export the last reply",
  "  /exportlastn [-t] <n> <file>: Export the last n replies",
  "  /exportn [-t] <n> <file>: Export the n-th reply from the end",
  "     -t strips reasoning blocks",
  "  /<param> <value>: Set a parameter of the current model (see /modelinfo)",
  "  /<param> unset: Revert a parameter to its default",
  "  /stream <true|false>, /history_limit <n>",
  "  /help: Show this help message",
].join("\n");

export function formatModelList(ids: string[] = listModelIds()): string {
  const lines = ["Supported models (built-in subset):", ...ids.map((id) => `  ${id}`), "", `View the full models list and details at: ${MODELS_URL}`];
  return `${lines.join("\n")}\n`;
}

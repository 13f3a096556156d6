import type { ChatMessage, EffectiveSettings, ModelDefinition } from "./llm/Interfaces";

export const REASONING_BEGIN = "[Begin of Assistant Reasoning]";
export const REASONING_END = "[/End of Assistant Reasoning]";

// -s content wins over the system prompt stored in the conversation file.
export function resolveSystemPrompt(sysPromptContent: string | undefined, fileSystem: string): string {
  return sysPromptContent && sysPromptContent.length > 0 ? sysPromptContent : fileSystem;
}

export function thinkingSystemMessage(definition: ModelDefinition, settings: EffectiveSettings): ChatMessage | undefined {
  const control = definition.thinking;
  if (!control || control.mode !== "system-message") return undefined;
  const thinking = settings.params.thinking === true;
  if (thinking) return { role: "system", content: control.on };
  if (control.off) return { role: "system", content: control.off };
  return undefined;
}

export function buildRequestMessages({ definition, settings, system, history }: {
  definition: ModelDefinition;
  settings: EffectiveSettings;
  system: string;
  history: ChatMessage[];
}): ChatMessage[] {
  const messages: ChatMessage[] = [];
  const thinking = thinkingSystemMessage(definition, settings);
  if (thinking) messages.push(thinking);
  if (system.length > 0) messages.push({ role: "system", content: system });
  messages.push(...history);
  return messages;
}

// One-shot prompts carry only the -s prompt and the user's text; no thinking control.
export function quietRequestMessages(system: string, userInput: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (system.length > 0) messages.push({ role: "system", content: system });
  messages.push({ role: "user", content: userInput });
  return messages;
}

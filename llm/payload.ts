import type { ChatMessage, EffectiveSettings, ModelDefinition, ParameterValue } from "./Interfaces";
import { getModelDefinition } from "./ModelDefaults";

export interface ChatPayload {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
  chat_template_kwargs?: { thinking: boolean };
  [field: string]: unknown;
}

/**
 * Shapes the request body for the active model. Only parameters with a
 * non-empty apiKey are sent; `omitWhen` values and empty stop strings are
 * left out, and null goes out only for nullable parameters.
 */
export function buildPayload(
  settings: EffectiveSettings,
  messages: ChatMessage[],
  definition: ModelDefinition = getModelDefinition(settings.model),
): ChatPayload {
  const payload: ChatPayload = {
    model: settings.model,
    messages,
    stream: settings.stream,
  };

  for (const [name, param] of Object.entries(definition.parameters)) {
    if (!param.apiKey) continue;
    const value: ParameterValue = name in settings.params ? settings.params[name] : param.default;

    if (value === null) {
      if (param.nullable) payload[param.apiKey] = null;
      continue;
    }
    if (param.omitWhen !== undefined && value === param.omitWhen) continue;
    if (param.type === "string_array" && value === "") continue;
    payload[param.apiKey] = value;
  }

  if (definition.thinking?.mode === "chat-template-kwargs") {
    payload.chat_template_kwargs = { thinking: settings.params.thinking === true };
  }
  return payload;
}

// Debug view with message bodies shortened.
export function describePayload(payload: ChatPayload): string {
  const messages = payload.messages.map((m) => ({
    role: m.role,
    content: m.content.length > 80 ? `${m.content.slice(0, 80)}…` : m.content,
  }));
  return JSON.stringify({ ...payload, messages }, null, 2);
}

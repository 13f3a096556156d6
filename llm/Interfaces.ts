export type ParameterType = "float" | "int" | "string" | "bool" | "string_array";

export type ParameterValue = number | string | boolean | null;

export interface ModelParameter {
  type: ParameterType;
  default: ParameterValue;
  min?: number;
  max?: number;
  options?: string[];
  description: string;
  // Field name in the request body. Empty means the setting is handled locally.
  apiKey: string;
  // A value that means "leave the field out of the payload".
  omitWhen?: ParameterValue;
  // Send an explicit null when the value is unset.
  nullable?: boolean;
}

export type ThinkingControl =
  | { mode: "system-message"; on: string; off?: string }
  | { mode: "chat-template-kwargs" };

export interface ModelDefinition {
  thinking?: ThinkingControl;
  parameters: Record<string, ModelParameter>;
}

export type ModelSettings = Record<string, ParameterValue>;

export type Role = "system" | "user" | "assistant";

// Roles written by nvchat are Role; roles found in a file are kept as they are.
export interface ChatMessage {
  role: Role | string;
  content: string;
}

// Stored values of any JSON type survive a rewrite; only schema-typed ones are used.
export type StoredModelSettings = Record<string, unknown>;

export interface StoredSettings {
  stream: boolean;
  history_limit: number;
  default: StoredModelSettings;
  models: Record<string, StoredModelSettings>;
}

export interface ConversationFile {
  system: string;
  settings: StoredSettings;
  messages: ChatMessage[];
}

export interface EffectiveSettings {
  model: string;
  stream: boolean;
  historyLimit: number;
  params: ModelSettings;
}

export interface RemoteModel {
  id: string;
  owned_by?: string;
  created?: number;
}

import type { EffectiveSettings, ParameterValue, StoredModelSettings, StoredSettings } from "../llm/Interfaces";
import {
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_STREAM,
  coerceParameter,
  formatParameterValue,
  getModelDefinition,
  matchesParameterType,
  parameterDefaults,
  parseBoolean,
  validateParameter,
} from "../llm/ModelDefaults";

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

// Raw strings from the environment or the command line, keyed by parameter name.
export type SettingOverrides = Record<string, string>;

export const GLOBAL_SETTINGS = ["stream", "history_limit"];

export interface ResolveSettingsOptions {
  model: string;
  file?: StoredSettings;
  overrides?: SettingOverrides;
  // When set, overrides the model rejects are skipped and reported here instead of thrown.
  onRejectedOverride?: (name: string, reason: string) => void;
}

function storedParametersFor(model: string, file: StoredSettings | undefined): StoredModelSettings | undefined {
  if (!file) return undefined;
  return file.models[model] ?? file.default;
}

export function resolveSettings({ model, file, overrides = {}, onRejectedOverride }: ResolveSettingsOptions): EffectiveSettings {
  const definition = getModelDefinition(model);
  const params = parameterDefaults(definition);
  let stream = DEFAULT_STREAM;
  let historyLimit = DEFAULT_HISTORY_LIMIT;

  const stored = storedParametersFor(model, file);
  if (stored) {
    for (const [name, param] of Object.entries(definition.parameters)) {
      if (!(name in stored)) continue;
      const value: unknown = stored[name];
      if (matchesParameterType(value, param) || (value === null && param.nullable)) {
        params[name] = value;
      }
    }
  }
  if (file) {
    if (typeof file.stream === "boolean") stream = file.stream;
    // Zero means unset; any other value is taken and checked by validateSettings.
    if (Number.isInteger(file.history_limit) && file.history_limit !== 0) historyLimit = file.history_limit;
  }

  for (const [name, raw] of Object.entries(overrides)) {
    if (name === "history_limit") {
      const n = Number(raw.trim());
      if (!Number.isInteger(n) || raw.trim() === "") throw new SettingsError(`Invalid limit (-L): ${raw}`);
      historyLimit = n;
      continue;
    }
    const param = definition.parameters[name];
    if (name !== "stream" && !param) continue;

    const reason = validateParameter(name, raw, definition);
    if (reason) {
      if (onRejectedOverride) {
        onRejectedOverride(name, reason);
        continue;
      }
      throw new SettingsError(`Invalid ${name} (${reason}): ${raw}`);
    }
    if (name === "stream") {
      stream = parseBoolean(raw) ?? stream;
    } else {
      params[name] = coerceParameter(raw, param);
    }
  }

  return { model, stream, historyLimit, params };
}

/** Checks every parameter against the active model's schema. */
export function validateSettings(settings: EffectiveSettings): void {
  const definition = getModelDefinition(settings.model);
  for (const [name, param] of Object.entries(definition.parameters)) {
    const value = settings.params[name];
    if (value === null || value === undefined) continue;
    if (param.type === "string_array") continue;
    const raw = formatParameterValue(value);
    const reason = validateParameter(name, raw, definition);
    if (reason) throw new SettingsError(`Invalid ${name} (${reason}): ${raw}`);
  }
  if (!Number.isInteger(settings.historyLimit) || settings.historyLimit <= 0) {
    throw new SettingsError(`Invalid limit (-L): ${settings.historyLimit}`);
  }
}

export function isSettingName(settings: EffectiveSettings, name: string): boolean {
  return GLOBAL_SETTINGS.includes(name) || name in getModelDefinition(settings.model).parameters;
}

export function applySetting(settings: EffectiveSettings, name: string, raw: string): EffectiveSettings {
  const definition = getModelDefinition(settings.model);
  const reason = validateParameter(name, raw, definition);
  if (reason) throw new SettingsError(reason);

  if (name === "stream") {
    return { ...settings, stream: parseBoolean(raw) ?? settings.stream };
  }
  if (name === "history_limit") {
    return { ...settings, historyLimit: Number.parseInt(raw, 10) };
  }
  const value: ParameterValue = coerceParameter(raw, definition.parameters[name]);
  return { ...settings, params: { ...settings.params, [name]: value } };
}

export function unsetSetting(settings: EffectiveSettings, name: string): EffectiveSettings {
  if (name === "stream") return { ...settings, stream: DEFAULT_STREAM };
  if (name === "history_limit") return { ...settings, historyLimit: DEFAULT_HISTORY_LIMIT };
  const param = getModelDefinition(settings.model).parameters[name];
  if (!param) throw new SettingsError(`unknown parameter: ${name}`);
  return { ...settings, params: { ...settings.params, [name]: param.default } };
}

/**
 * Re-resolves parameters for another model's schema. The session's stream
 * and history limit carry over; overrides the new model rejects are skipped.
 */
export function switchModel(
  settings: EffectiveSettings,
  model: string,
  file: StoredSettings | undefined,
  overrides: SettingOverrides = {},
  onRejectedOverride: (name: string, reason: string) => void = () => {},
): EffectiveSettings {
  const resolved = resolveSettings({ model, file, overrides, onRejectedOverride });
  return { ...resolved, stream: settings.stream, historyLimit: settings.historyLimit };
}

function bannerValue(value: ParameterValue): string {
  return typeof value === "string" ? JSON.stringify(value) : formatParameterValue(value);
}

export function formatSettingsBanner(settings: EffectiveSettings): string {
  const parts = [`model=${settings.model}`, `stream=${settings.stream}`, `history_limit=${settings.historyLimit}`];
  for (const name of Object.keys(getModelDefinition(settings.model).parameters)) {
    if (!(name in settings.params)) continue;
    parts.push(`${name}=${bannerValue(settings.params[name])}`);
  }
  return parts.join(" ");
}

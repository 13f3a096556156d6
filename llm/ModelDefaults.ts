import { readFileSync } from "fs";
import type {
    ModelDefinition,
    ModelParameter,
    ModelSettings,
    ParameterType,
    ParameterValue,
    ThinkingControl,
} from "./Interfaces";

export const DEFAULT_BASE_URL = "https://integrate.api.nvidia.com/v1";
export const DEFAULT_MODEL = "openai/gpt-oss-120b";
export const DEFAULT_HISTORY_LIMIT = 40;
export const DEFAULT_STREAM = true;
export const FALLBACK_MODEL_KEY = "others";

const MODELS_FILE = new URL("./models.json", import.meta.url);
const PARAMETER_TYPES: ParameterType[] = ["float", "int", "string", "bool", "string_array"];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isParameterType(value: unknown): value is ParameterType {
    return PARAMETER_TYPES.some((t) => t === value);
}

function isParameterValue(value: unknown): value is ParameterValue {
    return value === null || typeof value === "number" || typeof value === "string" || typeof value === "boolean";
}

function parseParameter(modelId: string, name: string, raw: unknown): ModelParameter {
    if (!isRecord(raw) || !isParameterType(raw.type) || !isParameterValue(raw.default)) {
        throw new Error(`models.json: bad parameter ${name} for ${modelId}`);
    }
    const param: ModelParameter = {
        type: raw.type,
        default: raw.default,
        description: typeof raw.description === "string" ? raw.description : "",
        apiKey: typeof raw.apiKey === "string" ? raw.apiKey : name,
    };
    if (typeof raw.min === "number") param.min = raw.min;
    if (typeof raw.max === "number") param.max = raw.max;
    if (Array.isArray(raw.options)) {
        param.options = raw.options.filter((o): o is string => typeof o === "string");
    }
    if (raw.omitWhen !== undefined && isParameterValue(raw.omitWhen)) param.omitWhen = raw.omitWhen;
    if (raw.nullable === true) param.nullable = true;
    return param;
}

function parseThinking(modelId: string, raw: unknown): ThinkingControl | undefined {
    if (raw === undefined) return undefined;
    if (isRecord(raw)) {
        if (raw.mode === "chat-template-kwargs") return { mode: "chat-template-kwargs" };
        if (raw.mode === "system-message" && typeof raw.on === "string") {
            return typeof raw.off === "string"
                ? { mode: "system-message", on: raw.on, off: raw.off }
                : { mode: "system-message", on: raw.on };
        }
    }
    throw new Error(`models.json: bad thinking control for ${modelId}`);
}

export function parseModelTable(raw: unknown): Map<string, ModelDefinition> {
    if (!isRecord(raw)) throw new Error("models.json: expected an object");
    const table = new Map<string, ModelDefinition>();
    for (const [modelId, entry] of Object.entries(raw)) {
        if (!isRecord(entry) || !isRecord(entry.parameters)) {
            throw new Error(`models.json: bad entry for ${modelId}`);
        }
        const parameters: Record<string, ModelParameter> = {};
        for (const [name, param] of Object.entries(entry.parameters)) {
            parameters[name] = parseParameter(modelId, name, param);
        }
        const thinking = parseThinking(modelId, entry.thinking);
        table.set(modelId, thinking ? { thinking, parameters } : { parameters });
    }
    if (!table.has(FALLBACK_MODEL_KEY)) {
        throw new Error(`models.json: missing "${FALLBACK_MODEL_KEY}" entry`);
    }
    return table;
}

const MODEL_TABLE = parseModelTable(JSON.parse(readFileSync(MODELS_FILE, "utf-8")));

function fallbackDefinition(): ModelDefinition {
    const def = MODEL_TABLE.get(FALLBACK_MODEL_KEY);
    if (!def) throw new Error(`missing "${FALLBACK_MODEL_KEY}" model definition`);
    return def;
}

export function getModelDefinition(modelId: string): ModelDefinition {
    return MODEL_TABLE.get(modelId) ?? fallbackDefinition();
}

export function hasModelDefinition(modelId: string): boolean {
    return modelId !== FALLBACK_MODEL_KEY && MODEL_TABLE.has(modelId);
}

export function listModelIds(): string[] {
    return [...MODEL_TABLE.keys()].filter((id) => id !== FALLBACK_MODEL_KEY);
}

export function randomModelId(rng: () => number = Math.random): string {
    const ids = listModelIds();
    const index = Math.min(ids.length - 1, Math.floor(rng() * ids.length));
    return ids[index];
}

export function allParameterNames(): string[] {
    const names = new Set<string>();
    for (const def of MODEL_TABLE.values()) {
        for (const name of Object.keys(def.parameters)) names.add(name);
    }
    return [...names].sort();
}

export function parameterDefaults(def: ModelDefinition): ModelSettings {
    const out: ModelSettings = {};
    for (const [name, param] of Object.entries(def.parameters)) {
        out[name] = param.default;
    }
    return out;
}

// Accepted boolean spellings.
const TRUE_STRINGS = ["1", "t", "T", "TRUE", "true", "True"];
const FALSE_STRINGS = ["0", "f", "F", "FALSE", "false", "False"];

export function parseBoolean(raw: string): boolean | undefined {
    if (TRUE_STRINGS.includes(raw)) return true;
    if (FALSE_STRINGS.includes(raw)) return false;
    return undefined;
}

function parseInteger(raw: string): number | undefined {
    return /^[+-]?\d+$/.test(raw.trim()) ? Number.parseInt(raw, 10) : undefined;
}

function parseFloatStrict(raw: string): number | undefined {
    const trimmed = raw.trim();
    if (trimmed === "") return undefined;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
}

export function formatNumber(value: number): string {
    return String(value);
}

function describeRange(param: ModelParameter): string | undefined {
    const { min, max } = param;
    if (min !== undefined && max !== undefined) return `[${formatNumber(min)}, ${formatNumber(max)}]`;
    if (min !== undefined) return `>= ${formatNumber(min)}`;
    if (max !== undefined) return `<= ${formatNumber(max)}`;
    return undefined;
}

function outOfRange(param: ModelParameter, value: number): boolean {
    return (param.min !== undefined && value < param.min) || (param.max !== undefined && value > param.max);
}

/**
 * Checks a raw string against the model schema. Returns an error message, or
 * undefined when the value is acceptable. `stream` and `history_limit` are
 * accepted for every model.
 */
export function validateParameter(name: string, raw: string, def: ModelDefinition): string | undefined {
    const param = def.parameters[name];
    if (!param) {
        if (name === "stream") {
            return parseBoolean(raw) === undefined ? `invalid boolean value for stream: ${raw}` : undefined;
        }
        if (name === "history_limit") {
            const v = parseInteger(raw);
            return v === undefined || v < 0 ? `invalid non-negative integer for history_limit: ${raw}` : undefined;
        }
        return `unknown parameter: ${name}`;
    }

    switch (param.type) {
        case "float": {
            const v = parseFloatStrict(raw);
            if (v === undefined) return `invalid float value: ${raw}`;
            if (outOfRange(param, v)) return `value out of range ${describeRange(param)}: ${formatNumber(v)}`;
            return undefined;
        }
        case "int": {
            const v = parseInteger(raw);
            if (v === undefined) return `invalid integer value: ${raw}`;
            if (outOfRange(param, v)) return `value out of range ${describeRange(param)}: ${v}`;
            return undefined;
        }
        case "string":
            if (param.options && param.options.length > 0 && !param.options.includes(raw)) {
                return `invalid option. Must be one of: ${param.options.join(", ")}`;
            }
            return undefined;
        case "bool":
            return parseBoolean(raw) === undefined ? `invalid boolean value (true/false): ${raw}` : undefined;
        case "string_array":
            return undefined;
    }
}

/** Turns a raw string into the parameter's typed value. Call validateParameter first. */
export function coerceParameter(raw: string, param: ModelParameter): ParameterValue {
    switch (param.type) {
        case "float":
            return parseFloatStrict(raw) ?? param.default;
        case "int":
            return parseInteger(raw) ?? param.default;
        case "bool":
            return parseBoolean(raw) ?? param.default;
        case "string":
        case "string_array":
            return raw;
    }
}

/** Checks that a value read from JSON has the parameter's type. */
export function matchesParameterType(value: unknown, param: ModelParameter): value is ParameterValue {
    switch (param.type) {
        case "float":
            return typeof value === "number" && Number.isFinite(value);
        case "int":
            return typeof value === "number" && Number.isInteger(value);
        case "bool":
            return typeof value === "boolean";
        case "string":
        case "string_array":
            return typeof value === "string";
    }
}

export function formatParameterValue(value: ParameterValue): string {
    if (value === null) return "null";
    if (typeof value === "number") return formatNumber(value);
    return String(value);
}

const BOLD = "\x1B[1m";
const BLUE = "\x1B[34m";
const RESET = "\x1B[0m";

export function formatModelInfo(modelId: string, def: ModelDefinition, color = true): string {
    const bold = color ? BOLD : "";
    const blue = color ? BLUE : "";
    const reset = color ? RESET : "";
    const lines: string[] = [`${bold}Model: ${modelId}${reset}`, "", `${bold}Parameters:${reset}`];

    for (const name of Object.keys(def.parameters).sort()) {
        const param = def.parameters[name];
        lines.push(`  ${blue}${name}${reset}`);
        lines.push(`    Description: ${param.description}`);
        lines.push(`    Type: ${param.type}`);

        let defaultText = "Not set";
        if (param.default !== null) defaultText = formatParameterValue(param.default);
        else if (param.nullable) defaultText = "null (omitted)";
        lines.push(`    Default: ${defaultText}`);

        if (param.type === "float" || param.type === "int") {
            const { min, max } = param;
            if (min !== undefined && max !== undefined) lines.push(`    Range: ${formatNumber(min)} to ${formatNumber(max)}`);
            else if (min !== undefined) lines.push(`    Range: >= ${formatNumber(min)}`);
            else if (max !== undefined) lines.push(`    Range: <= ${formatNumber(max)}`);
        }
        if (param.options && param.options.length > 0) {
            lines.push(`    Options: ${param.options.join(", ")}`);
        }
        lines.push("");
    }

    if (def.thinking) {
        lines.push(`${bold}Special Behavior:${reset}`);
        if (def.thinking.mode === "system-message") {
            const off = def.thinking.off ? ` ('${def.thinking.off}' when off)` : "";
            lines.push(`  - This model uses a system message ('${def.thinking.on}')${off} to control thinking. Use \`/thinking true\` to enable.`);
        } else {
            lines.push("  - This model uses 'chat_template_kwargs' to control thinking. Use `/thinking true` to enable.");
        }
    }
    return `${lines.join("\n")}\n`;
}

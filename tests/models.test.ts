import { describe, expect, it } from "vitest";
import {
  DEFAULT_MODEL,
  allParameterNames,
  coerceParameter,
  formatModelInfo,
  getModelDefinition,
  hasModelDefinition,
  listModelIds,
  parameterDefaults,
  parseBoolean,
  parseModelTable,
  randomModelId,
  validateParameter,
} from "../llm/ModelDefaults";

describe("model table", () => {
  it("lists built-in models without the fallback entry", () => {
    const ids = listModelIds();
    expect(ids[0]).toBe(DEFAULT_MODEL);
    expect(ids).toHaveLength(17);
    expect(ids).not.toContain("others");
    expect(hasModelDefinition("others")).toBe(false);
    expect(hasModelDefinition("deepseek-ai/deepseek-v3.1")).toBe(true);
  });

  it("falls back to the generic schema for unknown ids", () => {
    expect(getModelDefinition("someone/unknown-model")).toBe(getModelDefinition("others"));
  });

  it("exposes defaults for a model", () => {
    expect(parameterDefaults(getModelDefinition("others"))).toEqual({
      temperature: 0.5,
      top_p: 1,
      max_tokens: 1024,
      frequency_penalty: 0,
      presence_penalty: 0,
      stop: "",
    });
  });

  it("collects every parameter name sorted", () => {
    const names = allParameterNames();
    expect(names).toContain("reasoning_effort");
    expect(names).toContain("thinking_budget");
    expect(names).toEqual([...names].sort());
  });

  it("picks random models through the injected generator", () => {
    const ids = listModelIds();
    expect(randomModelId(() => 0)).toBe(ids[0]);
    expect(randomModelId(() => 0.9999999)).toBe(ids[ids.length - 1]);
  });

  it("rejects a table without the fallback entry", () => {
    expect(() => parseModelTable({ a: { parameters: {} } })).toThrow('models.json: missing "others" entry');
  });

  it("rejects a parameter with an unknown type", () => {
    expect(() => parseModelTable({ others: { parameters: { x: { type: "date", default: 1 } } } })).toThrow(
      "models.json: bad parameter x for others",
    );
  });
});

describe("parseBoolean", () => {
  it("accepts the usual spellings", () => {
    expect(parseBoolean("True")).toBe(true);
    expect(parseBoolean("t")).toBe(true);
    expect(parseBoolean("0")).toBe(false);
    expect(parseBoolean("FALSE")).toBe(false);
    expect(parseBoolean("yes")).toBeUndefined();
  });
});

describe("validateParameter", () => {
  const gptOss = getModelDefinition("openai/gpt-oss-120b");

  it("checks float ranges", () => {
    expect(validateParameter("temperature", "0.7", gptOss)).toBeUndefined();
    expect(validateParameter("temperature", "1.5", gptOss)).toBe("value out of range [0, 1]: 1.5");
    expect(validateParameter("temperature", "hot", gptOss)).toBe("invalid float value: hot");
  });

  it("checks integers and one-sided ranges", () => {
    const seedOss = getModelDefinition("bytedance/seed-oss-36b-instruct");
    expect(validateParameter("max_tokens", "0", seedOss)).toBe("value out of range >= 1: 0");
    expect(validateParameter("max_tokens", "1.5", seedOss)).toBe("invalid integer value: 1.5");
    expect(validateParameter("max_tokens", "99999", seedOss)).toBeUndefined();
  });

  it("checks options", () => {
    expect(validateParameter("reasoning_effort", "extreme", gptOss)).toBe("invalid option. Must be one of: low, medium, high");
    expect(validateParameter("reasoning_effort", "high", gptOss)).toBeUndefined();
  });

  it("checks booleans", () => {
    const nano = getModelDefinition("nvidia/nvidia-nemotron-nano-9b-v2");
    expect(validateParameter("thinking", "maybe", nano)).toBe("invalid boolean value (true/false): maybe");
  });

  it("handles global settings and unknown names", () => {
    expect(validateParameter("stream", "nope", gptOss)).toBe("invalid boolean value for stream: nope");
    expect(validateParameter("history_limit", "-1", gptOss)).toBe("invalid non-negative integer for history_limit: -1");
    expect(validateParameter("thinking", "true", gptOss)).toBe("unknown parameter: thinking");
  });
});

describe("coerceParameter", () => {
  it("produces typed values", () => {
    const def = getModelDefinition("nvidia/nvidia-nemotron-nano-9b-v2");
    expect(coerceParameter("0.25", def.parameters.temperature)).toBe(0.25);
    expect(coerceParameter("512", def.parameters.max_tokens)).toBe(512);
    expect(coerceParameter("true", def.parameters.thinking)).toBe(true);
    expect(coerceParameter("END", def.parameters.stop)).toBe("END");
  });
});

describe("formatModelInfo", () => {
  it("renders parameters in name order without color", () => {
    const text = formatModelInfo("google/gemma-7b", getModelDefinition("google/gemma-7b"), false);
    expect(text).toBe(
      [
        "Model: google/gemma-7b",
        "",
        "Parameters:",
        "  max_tokens",
        `    Description: ${getModelDefinition("google/gemma-7b").parameters.max_tokens.description}`,
        "    Type: int",
        "    Default: 1024",
        "    Range: 1 to 1024",
        "",
        "  stop",
        `    Description: ${getModelDefinition("google/gemma-7b").parameters.stop.description}`,
        "    Type: string_array",
        "    Default: ",
        "",
        "  temperature",
        `    Description: ${getModelDefinition("google/gemma-7b").parameters.temperature.description}`,
        "    Type: float",
        "    Default: 0.5",
        "    Range: 0 to 1",
        "",
        "  top_p",
        `    Description: ${getModelDefinition("google/gemma-7b").parameters.top_p.description}`,
        "    Type: float",
        "    Default: 1",
        "    Range: 0 to 1",
        "",
        "",
      ].join("\n"),
    );
  });

  it("describes nullable defaults and thinking control", () => {
    const text = formatModelInfo("deepseek-ai/deepseek-v3.1", getModelDefinition("deepseek-ai/deepseek-v3.1"), false);
    expect(text).toContain("    Default: null (omitted)\n");
    expect(text).toContain("Special Behavior:\n  - This model uses 'chat_template_kwargs' to control thinking. Use `/thinking true` to enable.\n");
  });
});

import { REASONING_BEGIN, REASONING_END } from "../prompt";

export const TRANSCRIPT_REASONING_OPEN = `${REASONING_BEGIN}\n`;
export const TRANSCRIPT_REASONING_CLOSE = `\n${REASONING_END}\n\n`;

export interface ChoiceText {
  reasoning: string;
  content: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(source: unknown, key: string): string {
  if (!isRecord(source)) return "";
  const value = source[key];
  return typeof value === "string" ? value : "";
}

function firstChoice(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) return undefined;
  const choice: unknown = body.choices[0];
  return isRecord(choice) ? choice : undefined;
}

/** Stream chunk: `delta.*` when a delta is present, otherwise `message.*`. */
export function extractChunkText(chunk: unknown): ChoiceText | undefined {
  const choice = firstChoice(chunk);
  if (!choice) return undefined;
  const source = isRecord(choice.delta) ? choice.delta : choice.message;
  return {
    reasoning: stringField(source, "reasoning_content"),
    content: stringField(source, "content"),
  };
}

/** Whole response body: `delta.*` first, each field falling back to `message.*`. */
export function extractBodyText(body: unknown): ChoiceText {
  const choice = firstChoice(body);
  if (!choice) return { reasoning: "", content: "" };
  return {
    reasoning: stringField(choice.delta, "reasoning_content") || stringField(choice.message, "reasoning_content"),
    content: stringField(choice.delta, "content") || stringField(choice.message, "content"),
  };
}

/** One SSE line to its JSON chunk, or undefined for separators, `[DONE]` and junk. */
export function parseSSELine(rawLine: string): unknown {
  let line = rawLine.trim();
  if (line.startsWith("data:")) line = line.slice(5).trim();
  if (!line || line === "[DONE]") return undefined;
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch {
    return undefined;
  }
}

/** Splits network chunks into complete lines, keeping the trailing partial line. */
export function createLineSplitter() {
  const decoder = new TextDecoder();
  let buffer = "";
  return {
    push(bytes: Uint8Array): string[] {
      buffer += decoder.decode(bytes, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() || "";
      return lines;
    },
    flush(): string[] {
      buffer += decoder.decode();
      const rest = buffer;
      buffer = "";
      return rest.length > 0 ? [rest] : [];
    },
  };
}

export type DisplayEvent =
  | { kind: "reasoning-start" }
  | { kind: "reasoning"; text: string }
  | { kind: "reasoning-end" }
  | { kind: "content"; text: string };

/**
 * Folds reasoning/content deltas into the transcript text. The reasoning
 * segment is opened on its first delta and closed when content starts or
 * the response ends.
 */
export function createTranscriptBuilder(onEvent: (event: DisplayEvent) => void = () => {}) {
  let transcript = "";
  let inReasoning = false;
  let sawContent = false;

  const closeReasoning = () => {
    if (!inReasoning) return;
    transcript += TRANSCRIPT_REASONING_CLOSE;
    inReasoning = false;
    onEvent({ kind: "reasoning-end" });
  };

  return {
    push({ reasoning, content }: ChoiceText): void {
      if (reasoning) {
        if (!inReasoning) {
          transcript += TRANSCRIPT_REASONING_OPEN;
          inReasoning = true;
          onEvent({ kind: "reasoning-start" });
        }
        transcript += reasoning;
        onEvent({ kind: "reasoning", text: reasoning });
      }
      if (content) {
        closeReasoning();
        sawContent = true;
        transcript += content;
        onEvent({ kind: "content", text: content });
      }
    },
    finish(): string {
      closeReasoning();
      return transcript;
    },
    get text(): string {
      return transcript;
    },
    get hasContent(): boolean {
      return sawContent;
    },
  };
}

export type TranscriptBuilder = ReturnType<typeof createTranscriptBuilder>;

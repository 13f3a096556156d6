import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConversationFileError, ConversationLimitError, ensureConversationFile, persistSystem, readConversation } from "../src/conversation";
import { APIError } from "../llm/chat_api";
import { createReplyPrinter, describeTurnError, runQuietTurn, runTurn, userMessage, type Connection } from "../src/session";
import { SettingsError, resolveSettings } from "../src/settings";

let dir: string;
let file: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), "nvchat-session-"));
  file = path.join(dir, "chat.json");
  ensureConversationFile(file);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function sse(...deltas: Array<Record<string, string>>): Response {
  const text = deltas.map((d) => `data: ${JSON.stringify({ choices: [{ delta: d }] })}\n\n`).join("") + "data: [DONE]\n\n";
  return new Response(text, { status: 200 });
}

function connection(response: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
  const conn: Connection = { baseUrl: "https://example.test/v1", accessToken: "test-secret", fetch: fetchMock };
  return { conn, fetchMock };
}

function sentBody(fetchMock: ReturnType<typeof connection>["fetchMock"]): unknown {
  const init = fetchMock.mock.calls[0][1];
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

describe("createReplyPrinter", () => {
  it("frames reasoning with markers", () => {
    const out: string[] = [];
    const print = createReplyPrinter((t) => out.push(t), false);
    print({ kind: "reasoning-start" });
    print({ kind: "reasoning", text: "r" });
    print({ kind: "reasoning-end" });
    print({ kind: "content", text: "c" });
    expect(out.join("")).toBe("\n[Begin of Assistant Reasoning]\nr\n[/End of Assistant Reasoning]\n\nc");
  });
});

describe("userMessage", () => {
  it("trims typed text and drops blank input", () => {
    expect(userMessage("  hello\n")).toBe("hello");
    expect(userMessage("line one\nline two\n")).toBe("line one\nline two");
    expect(userMessage(" \n\t")).toBeUndefined();
  });
});

describe("describeTurnError", () => {
  it("formats each kind of failure on one line", () => {
    expect(describeTurnError(new APIError(401, "Unauthorized", "bad token"))).toBe("API error: 401 Unauthorized: bad token");
    expect(describeTurnError(new ConversationLimitError("limit reached", 3, 2))).toBe("limit reached");
    expect(describeTurnError(new ConversationFileError("not JSON"))).toBe("not JSON");
    expect(describeTurnError(new SettingsError("Invalid limit (-L): 0"))).toBe("Invalid limit (-L): 0");
    expect(describeTurnError(new TypeError("fetch failed"))).toBe("Error: request failed: fetch failed");
    expect(describeTurnError("socket hang up")).toBe("Error: request failed: socket hang up");
  });
});

describe("runTurn", () => {
  it("stores typed input without its trailing newline", async () => {
    const { conn, fetchMock } = connection(() => sse({ content: "hi" }));
    const settings = resolveSettings({ model: "google/gemma-7b" });
    const text = userMessage("hello\n");
    expect(text).toBe("hello");
    await runTurn(text ?? "", { connection: conn, conversationPath: file, settings, write: () => {} });
    expect(readConversation(file).messages[0]).toEqual({ role: "user", content: "hello" });
    expect(sentBody(fetchMock)).toMatchObject({ messages: [{ role: "user", content: "hello" }] });
  });

  it("stores both sides of the exchange and prints the reply", async () => {
    const { conn, fetchMock } = connection(() => sse({ reasoning_content: "hm" }, { content: "Hi there" }));
    persistSystem(file, "Stored system.");
    const out: string[] = [];
    const settings = resolveSettings({ model: "google/gemma-7b" });

    const result = await runTurn("Hello", { connection: conn, conversationPath: file, settings, write: (t) => out.push(t) });

    expect(result.stopped).toBe(false);
    expect(out.join("")).toBe("\n[Begin of Assistant Reasoning]\nhm\n[/End of Assistant Reasoning]\n\nHi there\n");
    expect(readConversation(file).messages).toEqual([
      { role: "user", content: "Hello" },
      { role: "assistant", content: "[Begin of Assistant Reasoning]\nhm\n[/End of Assistant Reasoning]\n\nHi there" },
    ]);
    expect(sentBody(fetchMock)).toMatchObject({
      model: "google/gemma-7b",
      stream: true,
      messages: [
        { role: "system", content: "Stored system." },
        { role: "user", content: "Hello" },
      ],
    });
  });

  it("uses the -s prompt instead of the stored one", async () => {
    const { conn, fetchMock } = connection(() => sse({ content: "ok" }));
    persistSystem(file, "Stored system.");
    const settings = resolveSettings({ model: "google/gemma-7b" });
    await runTurn("Hello", { connection: conn, conversationPath: file, settings, sysPromptContent: "Flag system.", write: () => {} });
    expect(sentBody(fetchMock)).toMatchObject({ messages: [{ role: "system", content: "Flag system." }, { role: "user", content: "Hello" }] });
  });

  it("refuses to send past the limit but keeps the user message", async () => {
    const { conn, fetchMock } = connection(() => sse({ content: "never" }));
    const settings = resolveSettings({ model: "google/gemma-7b", overrides: { history_limit: "1" } });
    await runTurn("one", { connection: conn, conversationPath: file, settings, write: () => {} });
    await expect(runTurn("two", { connection: conn, conversationPath: file, settings, write: () => {} })).rejects.toBeInstanceOf(
      ConversationLimitError,
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(readConversation(file).messages.map((m) => m.content)).toEqual(["one", "never", "two"]);
  });

  it("prints an unrecognised non-streaming body without storing a reply", async () => {
    const { conn } = connection(() => new Response('{"unexpected":true}', { status: 200 }));
    const out: string[] = [];
    const settings = resolveSettings({ model: "google/gemma-7b", overrides: { stream: "false" } });
    await runTurn("Hello", { connection: conn, conversationPath: file, settings, write: (t) => out.push(t) });
    expect(out.join("")).toBe('{"unexpected":true}\n');
    expect(readConversation(file).messages).toEqual([{ role: "user", content: "Hello" }]);
  });
});

describe("runQuietTurn", () => {
  it("prints only the content followed by a newline", async () => {
    const { conn, fetchMock } = connection(() => sse({ reasoning_content: "hidden" }, { content: "42" }));
    const out: string[] = [];
    const settings = resolveSettings({ model: "google/gemma-7b" });
    await runQuietTurn("What is six times seven?", { connection: conn, settings, write: (t) => out.push(t) });
    expect(out.join("")).toBe("42\n");
    expect(sentBody(fetchMock)).toMatchObject({ messages: [{ role: "user", content: "What is six times seven?" }] });
  });

  it("sends only the system prompt and the user message", async () => {
    const { conn, fetchMock } = connection(() => sse({ content: "ok" }));
    const settings = resolveSettings({ model: "nvidia/llama-3.3-nemotron-super-49b-v1.5" });
    await runQuietTurn("Hi", { connection: conn, settings, sysPromptContent: "Be brief.", write: () => {} });
    expect(sentBody(fetchMock)).toMatchObject({
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
      ],
    });
  });

  it("falls back to the raw body for non-streaming replies without content", async () => {
    const { conn } = connection(() => new Response("plain text body", { status: 200 }));
    const out: string[] = [];
    const settings = resolveSettings({ model: "google/gemma-7b", overrides: { stream: "false" } });
    await runQuietTurn("Hi", { connection: conn, settings, write: (t) => out.push(t) });
    expect(out.join("")).toBe("plain text body\n");
  });
});

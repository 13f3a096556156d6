import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { CommanderError, type Command } from "commander";
import { describe, expect, it } from "vitest";
import { envOverrides, parseCli, resolvePromptInput } from "../src/cli";

const quiet = (program: Command) => {
  program.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
};

describe("parseCli", () => {
  it("returns defaults for no arguments", () => {
    expect(parseCli([], quiet, {})).toEqual({
      conversationFile: undefined,
      model: undefined,
      sysPromptFile: undefined,
      persistSystem: false,
      saveSettings: false,
      accessToken: undefined,
      prompt: undefined,
      list: false,
      listRemote: false,
      modelInfo: undefined,
      help: false,
      overrides: {},
    });
  });

  it("maps flags to parameter overrides", () => {
    const opts = parseCli(
      ["-m", "google/gemma-7b", "-T", "0.3", "-P", "0.9", "-M", "256", "--seed", "7", "--thinking", "true", "--stop", "END", "chat.json"],
      quiet,
      {},
    );
    expect(opts.model).toBe("google/gemma-7b");
    expect(opts.conversationFile).toBe("chat.json");
    expect(opts.overrides).toEqual({
      temperature: "0.3",
      top_p: "0.9",
      max_tokens: "256",
      seed: "7",
      thinking: "true",
      stop: "END",
    });
  });

  it("accepts both spellings of aliased flags", () => {
    expect(parseCli(["--reasoning-effort", "low"], quiet, {}).overrides).toEqual({ reasoning_effort: "low" });
    expect(parseCli(["--history-limit", "5"], quiet, {}).overrides).toEqual({ history_limit: "5" });
    expect(parseCli(["-L", "6"], quiet, {}).overrides).toEqual({ history_limit: "6" });
  });

  it("reads stream switches", () => {
    expect(parseCli(["--no-stream"], quiet, {}).overrides).toEqual({ stream: "false" });
    expect(parseCli(["--stream", "true"], quiet, {}).overrides).toEqual({ stream: "true" });
  });

  it("reads the boolean switches", () => {
    const opts = parseCli(["-s", "sys.txt", "-S", "--save-settings", "-k", "test-secret", "--prompt", "hi", "-l", "--list-remote", "-h"], quiet, {});
    expect(opts).toMatchObject({
      sysPromptFile: "sys.txt",
      persistSystem: true,
      saveSettings: true,
      accessToken: "test-secret",
      prompt: "hi",
      list: true,
      listRemote: true,
      help: true,
    });
  });

  it("reads --modelinfo", () => {
    expect(parseCli(["--modelinfo", "google/gemma-7b"], quiet, {}).modelInfo).toBe("google/gemma-7b");
  });

  it("rejects unknown options and extra arguments", () => {
    expect(() => parseCli(["--bogus"], quiet, {})).toThrow(CommanderError);
    expect(() => parseCli(["a.json", "b.json"], quiet, {})).toThrow(CommanderError);
  });
});

describe("envOverrides", () => {
  it("reads stream and history limit from the environment", () => {
    expect(envOverrides({ NVCHAT_STREAM: "0", NVCHAT_HISTORY_LIMIT: "80" })).toEqual({ stream: "0", history_limit: "80" });
    expect(envOverrides({})).toEqual({});
  });
});

describe("resolvePromptInput", () => {
  it("reads stdin, a file, or takes the text", async () => {
    const dir = mkdtempSync(path.join(tmpdir(), "nvchat-cli-"));
    try {
      const file = path.join(dir, "prompt.txt");
      writeFileSync(file, "from file");
      expect(await resolvePromptInput("-", async () => "from stdin")).toBe("from stdin");
      expect(await resolvePromptInput(file, async () => "unused")).toBe("from file");
      expect(await resolvePromptInput("just text", async () => "unused")).toBe("just text");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

import { describe, expect, it } from "vitest";
import { createLineEditor, isCommandLine } from "../src/ui/input";

describe("isCommandLine", () => {
  it("recognises a single slash line", () => {
    expect(isCommandLine("/help")).toBe(true);
    expect(isCommandLine("  /model x")).toBe(true);
    expect(isCommandLine("/path\nmore")).toBe(false);
    expect(isCommandLine("hello")).toBe(false);
  });
});

describe("createLineEditor", () => {
  it("adds newlines on Enter and submits on Ctrl+D", () => {
    const editor = createLineEditor();
    editor.feed("line one");
    expect(editor.feed("\r")).toEqual({ kind: "update", echo: "\n", rerender: false });
    editor.feed("line two");
    expect(editor.feed("\u0004")).toEqual({ kind: "submit", value: "line one\nline two" });
  });

  it("submits commands on Enter", () => {
    const editor = createLineEditor();
    editor.feed("/clear");
    expect(editor.feed("\r")).toEqual({ kind: "submit", value: "/clear" });
  });

  it("submits on Enter in single-line mode", () => {
    const editor = createLineEditor({ singleLine: true });
    editor.feed("test-secret");
    expect(editor.feed("\n")).toEqual({ kind: "submit", value: "test-secret" });
  });

  it("reports end of input on Ctrl+D with nothing typed", () => {
    const editor = createLineEditor();
    editor.feed("   ");
    expect(editor.feed("\u0004")).toEqual({ kind: "eof" });
  });

  it("exits on Ctrl+C", () => {
    expect(createLineEditor().feed("\u0003")).toEqual({ kind: "exit" });
  });

  it("erases whole characters on backspace", () => {
    const editor = createLineEditor();
    editor.feed("né😀");
    expect(editor.feed("\x7f")).toEqual({ kind: "update", echo: "", rerender: true });
    expect(editor.value).toBe("né");
    const empty = createLineEditor();
    expect(empty.feed("\x7f")).toEqual({ kind: "update", echo: "", rerender: false });
  });

  it("ignores escape and cursor keys", () => {
    const editor = createLineEditor();
    editor.feed("ab");
    expect(editor.feed("\u001b")).toEqual({ kind: "update", echo: "", rerender: false });
    expect(editor.feed("\u001b[A")).toEqual({ kind: "update", echo: "", rerender: false });
    expect(editor.value).toBe("ab");
  });

  it("takes bracketed paste literally", () => {
    const editor = createLineEditor();
    const step = editor.feed("\u001b[200~/first\r\nsecond\u001b[201~");
    expect(step).toEqual({ kind: "update", echo: "/first\nsecond", rerender: false });
    expect(editor.value).toBe("/first\nsecond");
  });

  it("keeps control keys literal inside a paste split across chunks", () => {
    const editor = createLineEditor();
    editor.feed("\u001b[200~a");
    expect(editor.feed("\u0004")).toEqual({ kind: "update", echo: "\u0004", rerender: false });
    editor.feed("b\u001b[201~");
    expect(editor.value).toBe("a\u0004b");
    expect(editor.feed("\u0004")).toEqual({ kind: "submit", value: "a\u0004b" });
  });
});

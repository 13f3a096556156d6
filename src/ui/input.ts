const PASTE_START = "\u001b[200~";
const PASTE_END = "\u001b[201~";
const CTRL_C = "\u0003";
const CTRL_D = "\u0004";
const ESC = "\u001b";

export type EditorStep =
  | { kind: "update"; echo: string; rerender: boolean }
  | { kind: "submit"; value: string }
  | { kind: "eof" }
  | { kind: "exit" };

// A first line starting with "/" is a command and goes out on Enter.
export function isCommandLine(value: string): boolean {
  return !value.includes("\n") && value.trimStart().startsWith("/");
}

/**
 * Raw-mode line editor. Enter inserts a newline (submits in single-line
 * mode), Ctrl+D submits, Ctrl+C exits; bracketed paste is taken literally.
 */
export function createLineEditor({ singleLine = false }: { singleLine?: boolean } = {}) {
  let value = "";
  let inPaste = false;

  const feed = (input: string): EditorStep => {
    let chunk = input;
    if (chunk.includes(PASTE_START)) {
      inPaste = true;
      chunk = chunk.split(PASTE_START).join("");
    }
    let pasteEnded = false;
    if (chunk.includes(PASTE_END)) {
      pasteEnded = true;
      chunk = chunk.split(PASTE_END).join("");
    }
    const literal = inPaste;
    if (pasteEnded) inPaste = false;

    if (!literal) {
      if (chunk === CTRL_C) return { kind: "exit" };
      if (chunk === CTRL_D) {
        return value.trim().length > 0 ? { kind: "submit", value } : { kind: "eof" };
      }
      if (chunk === "\r" || chunk === "\n") {
        if (singleLine || isCommandLine(value)) return { kind: "submit", value };
        value += "\n";
        return { kind: "update", echo: "\n", rerender: false };
      }
      if (chunk === "\x7f" || chunk === "\b") {
        if (value.length === 0) return { kind: "update", echo: "", rerender: false };
        value = [...value].slice(0, -1).join("");
        return { kind: "update", echo: "", rerender: true };
      }
      if (chunk === ESC || /^\u001b\[[0-9;]*[A-Za-z~]$/.test(chunk)) {
        return { kind: "update", echo: "", rerender: false };
      }
    }

    const normalized = chunk.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
    value += normalized;
    return { kind: "update", echo: normalized, rerender: false };
  };

  return {
    feed,
    get value() {
      return value;
    },
  };
}

export type InputResult = { kind: "line"; value: string } | { kind: "eof" };

function stripAnsi(text: string): string {
  return text.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, "");
}

function rowsFor(text: string, columns: number): number {
  return Math.max(
    1,
    text.split("\n").reduce((acc, line) => acc + Math.max(1, Math.ceil([...stripAnsi(line)].length / columns)), 0),
  );
}

/** Reads one message from a TTY in raw mode. */
export async function promptForInput(label: string, opts: { singleLine?: boolean } = {}): Promise<InputResult> {
  const stdin = process.stdin;
  const stdout = process.stderr;
  const editor = createLineEditor(opts);
  const wasRaw = stdin.isRaw;
  let renderedRows = 1;
  const columns = () => Math.max(1, stdout.columns || 80);

  const render = () => {
    if (renderedRows > 1) stdout.write(`\x1B[${renderedRows - 1}A`);
    stdout.write("\r\x1B[J");
    const text = label + editor.value;
    stdout.write(text);
    renderedRows = rowsFor(text, columns());
  };

  stdout.write(label);
  stdout.write("\x1B[?2004h");

  return await new Promise<InputResult>((resolve) => {
    const finish = (result: InputResult) => {
      stdin.removeListener("data", onData);
      stdout.write("\x1B[?2004l");
      if (!wasRaw) {
        stdin.setRawMode(false);
        stdin.pause();
      }
      resolve(result);
    };

    const onData = (chunk: string) => {
      const step = editor.feed(chunk);
      switch (step.kind) {
        case "exit":
          stdout.write("\x1B[?2004l\n");
          process.exit(130);
          return;
        case "eof":
          stdout.write("\n");
          finish({ kind: "eof" });
          return;
        case "submit":
          stdout.write("\n");
          finish({ kind: "line", value: step.value });
          return;
        case "update":
          if (step.rerender) render();
          else if (step.echo) stdout.write(step.echo);
          renderedRows = rowsFor(label + editor.value, columns());
      }
    };

    if (!wasRaw) stdin.setRawMode(true);
    // Ink can leave stdin paused after unmount.
    stdin.ref();
    stdin.resume();
    stdin.setEncoding("utf8");
    stdin.on("data", onData);
  });
}

/**
 * While a reply streams: Esc calls onStop, Ctrl+C exits. Returns the
 * function that detaches the listener.
 */
export function listenForStop(onStop: () => void): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) return () => {};
  const wasRaw = stdin.isRaw;
  const onKey = (key: string) => {
    if (key === ESC) onStop();
    else if (key === CTRL_C) {
      process.stderr.write("\n");
      process.exit(130);
    }
  };
  if (!wasRaw) stdin.setRawMode(true);
  stdin.resume();
  stdin.setEncoding("utf8");
  stdin.on("data", onKey);
  return () => {
    stdin.removeListener("data", onKey);
    if (!wasRaw) {
      stdin.setRawMode(false);
      stdin.pause();
    }
  };
}

export async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

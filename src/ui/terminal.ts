import type { Env } from "../config";

export const BOLD_TEXT = "\x1B[1m";
export const DIM_TEXT = "\x1B[2m";
export const RED_TEXT = "\x1B[31m";
export const GREEN_TEXT = "\x1B[32m";
export const BLUE_TEXT = "\x1B[34m";
export const RESET_TEXT = "\x1B[0m";

interface MaybeTTY {
  isTTY?: boolean;
}

export function colorEnabled(stream: MaybeTTY, env: Env = process.env): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  return Boolean(stream.isTTY);
}

export function colorize(code: string, text: string, enabled: boolean): string {
  return enabled ? `${code}${text}${RESET_TEXT}` : text;
}

const errColor = () => colorEnabled(process.stderr);

export const bold = (text: string) => colorize(BOLD_TEXT, text, errColor());
export const dim = (text: string) => colorize(DIM_TEXT, text, errColor());
export const blue = (text: string) => colorize(BLUE_TEXT, text, errColor());
export const green = (text: string) => colorize(GREEN_TEXT, text, errColor());
export const red = (text: string) => colorize(RED_TEXT, text, errColor());

// Informational output goes to stderr so stdout carries only the reply.
export function logInfo(message: string): void {
  process.stderr.write(`${message}\n`);
}

export function logSuccess(message: string): void {
  process.stderr.write(`${green(message)}\n`);
}

export function logError(message: string): void {
  process.stderr.write(`${red(message)}\n`);
}

export function debugEnabled(env: Env = process.env): boolean {
  const value = env.NVCHAT_DEBUG;
  return value === "1" || value === "true";
}

export function logDebug(label: string, body: string, env: Env = process.env): void {
  if (!debugEnabled(env)) return;
  process.stderr.write(`${dim(`[debug] ${label}`)}\n${body}\n`);
}

export const DISCLAIMER = [
  "AI models generate responses and outputs based on complex algorithms and machine learning techniques,",
  "and those responses or outputs may be inaccurate, harmful, biased or indecent. By testing this model,",
  "you assume the risk of any harm caused by any response or output of the model. Please do not upload",
  "any confidential information or personal data unless expressly permitted. Your use is logged for",
  "security purposes.",
].join("\n");

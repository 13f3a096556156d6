import { writeFileSync } from "fs";
import type { ConversationFile } from "../llm/Interfaces";

const THINKING_BLOCK = /\[Begin of Assistant Reasoning\][\s\S]*?\[\/End of Assistant Reasoning\]\s*\n?/g;
export const EXPORT_SEPARATOR = "\n\n---\n\n";

export function filterThinkingBlock(text: string): string {
  return text.replace(THINKING_BLOCK, "");
}

function assistantReplies(conversation: ConversationFile): string[] {
  return conversation.messages.filter((m) => m.role === "assistant").map((m) => m.content);
}

function assertPositive(n: number): void {
  if (!Number.isInteger(n) || n <= 0) throw new Error(`invalid number: ${n}`);
}

/** The last n assistant replies, oldest first. */
export function lastNReplies(n: number, conversation: ConversationFile, filter: boolean): string {
  assertPositive(n);
  const replies = assistantReplies(conversation);
  if (replies.length === 0) throw new Error("no assistant responses found");
  const picked = replies.slice(-n).map((r) => (filter ? filterThinkingBlock(r) : r));
  return picked.join(EXPORT_SEPARATOR);
}

/** The n-th reply counting back from the last one (1 = last). */
export function nthReply(n: number, conversation: ConversationFile, filter: boolean): string {
  assertPositive(n);
  const replies = assistantReplies(conversation);
  if (replies.length === 0) throw new Error("no assistant responses found");
  const index = replies.length - n;
  if (index < 0) {
    throw new Error(`index out of bounds: specified ${n}, but there are only ${replies.length} assistant responses`);
  }
  return filter ? filterThinkingBlock(replies[index]) : replies[index];
}

export function exportLastN(n: number, conversation: ConversationFile, target: string, filter = false): void {
  writeFileSync(target, lastNReplies(n, conversation, filter));
}

export function exportNth(n: number, conversation: ConversationFile, target: string, filter = false): void {
  writeFileSync(target, nthReply(n, conversation, filter));
}

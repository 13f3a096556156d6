import type { ChatPayload } from "./payload";
import {
    createLineSplitter,
    createTranscriptBuilder,
    extractBodyText,
    extractChunkText,
    parseSSELine,
    type DisplayEvent,
    type TranscriptBuilder,
} from "./stream";

export class APIError extends Error {
    readonly status: number;
    readonly statusText: string;
    readonly body: string;

    constructor(status: number, statusText: string, body: string) {
        super(`${status} ${statusText}${body ? `: ${body}` : ""}`);
        this.name = "APIError";
        this.status = status;
        this.statusText = statusText;
        this.body = body;
    }
}

export interface ChatRequestOptions {
    baseUrl: string;
    accessToken: string;
    payload: ChatPayload;
    signal?: AbortSignal;
    fetch?: typeof fetch;
    onEvent?: (event: DisplayEvent) => void;
}

export interface ChatResult {
    // Transcript text, reasoning wrapped in markers.
    text: string;
    hasContent: boolean;
    stopped: boolean;
    // Set for non-streaming responses.
    rawBody?: string;
}

export function chatCompletionsUrl(baseUrl: string): string {
    return `${baseUrl.replace(/\/+$/, "")}/chat/completions`;
}

async function readEventStream(body: ReadableStream<Uint8Array>, builder: TranscriptBuilder): Promise<void> {
    const reader = body.getReader();
    const splitter = createLineSplitter();
    const handleLine = (line: string) => {
        const chunk = parseSSELine(line);
        if (chunk === undefined) return;
        const text = extractChunkText(chunk);
        if (text) builder.push(text);
    };

    try {
        while (true) {
            const { value, done } = await reader.read();
            if (done) break;
            for (const line of splitter.push(value)) handleLine(line);
        }
        for (const line of splitter.flush()) handleLine(line);
    } finally {
        reader.releaseLock();
    }
}

function parseJSONBody(raw: string): unknown {
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        return undefined;
    }
}

/**
 * One POST to `<baseUrl>/chat/completions`. No timeout and no retries.
 * Aborting through `signal` ends a stream early; the text received so far
 * comes back with `stopped` set.
 */
export async function sendChatCompletion(opts: ChatRequestOptions): Promise<ChatResult> {
    const fetchImpl = opts.fetch ?? fetch;
    const builder = createTranscriptBuilder(opts.onEvent);
    const stopped = (): ChatResult => ({ text: builder.finish(), hasContent: builder.hasContent, stopped: true });

    let response: Response;
    try {
        response = await fetchImpl(chatCompletionsUrl(opts.baseUrl), {
            method: "POST",
            headers: {
                "Authorization": `Bearer ${opts.accessToken}`,
                "Content-Type": "application/json",
                "Accept": opts.payload.stream ? "text/event-stream" : "application/json",
            },
            signal: opts.signal,
            body: JSON.stringify(opts.payload),
        });
    } catch (error) {
        if (opts.signal?.aborted) return stopped();
        throw error;
    }

    if (response.status >= 400) {
        const body = await response.text().catch(() => "");
        throw new APIError(response.status, response.statusText, body);
    }

    if (opts.payload.stream) {
        if (!response.body) {
            return { text: "", hasContent: false, stopped: false };
        }
        try {
            await readEventStream(response.body, builder);
        } catch (error) {
            if (opts.signal?.aborted) return stopped();
            throw error;
        }
        return { text: builder.finish(), hasContent: builder.hasContent, stopped: false };
    }

    let rawBody: string;
    try {
        rawBody = await response.text();
    } catch (error) {
        if (opts.signal?.aborted) return stopped();
        throw error;
    }
    builder.push(extractBodyText(parseJSONBody(rawBody)));
    return { text: builder.finish(), hasContent: builder.hasContent, stopped: false, rawBody };
}

import type { ChatCompletionChunk, Clock, FinishReason } from "./chunks.js";

// Downstream framing: chunks to an event-stream body, or to one aggregate
// completion for non-streaming callers.

export const DONE_FRAME = "data: [DONE]\n\n";

export function encodeChunkFrame(chunk: ChatCompletionChunk): string {
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

export async function* toEventStream(chunks: AsyncIterable<ChatCompletionChunk>): AsyncGenerator<string, void, undefined> {
  for await (const chunk of chunks) {
    yield encodeChunkFrame(chunk);
  }
  yield DONE_FRAME;
}

export interface ChatCompletion {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: [
    {
      index: 0;
      message: { role: "assistant"; content: string };
      finish_reason: FinishReason | null;
    },
  ];
}

/** Used for the envelope when the stream produced no chunk at all. */
export interface CompletionFallback {
  id: string;
  model: string;
  now?: Clock;
}

export async function collectCompletion(
  chunks: AsyncIterable<ChatCompletionChunk>,
  fallback: CompletionFallback,
): Promise<ChatCompletion> {
  let first: ChatCompletionChunk | undefined;
  let content = "";
  let finishReason: FinishReason | null = null;

  for await (const chunk of chunks) {
    first ??= chunk;
    const [choice] = chunk.choices;
    if (choice.delta.content !== undefined) content += choice.delta.content;
    if (choice.finish_reason !== null) finishReason = choice.finish_reason;
  }

  const now = fallback.now ?? Date.now;
  return {
    id: first?.id ?? fallback.id,
    object: "chat.completion",
    created: first?.created ?? Math.floor(now() / 1000),
    model: first?.model ?? fallback.model,
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: finishReason }],
  };
}

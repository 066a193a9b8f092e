import type { ChatCompletionChunk } from "../stream/chunks.js";
import { collectCompletion, toEventStream, type CompletionFallback } from "../stream/framing.js";

export type OutputFormat = "json" | "sse" | "aggregate";

/** Text the `transduce` command writes to stdout, piece by piece. */
export async function* renderChunks(
  chunks: AsyncIterable<ChatCompletionChunk>,
  format: OutputFormat,
  fallback: CompletionFallback,
): AsyncGenerator<string, void, undefined> {
  switch (format) {
    case "sse":
      yield* toEventStream(chunks);
      return;
    case "aggregate":
      yield `${JSON.stringify(await collectCompletion(chunks, fallback), null, 2)}\n`;
      return;
    case "json":
      for await (const chunk of chunks) {
        yield `${JSON.stringify(chunk)}\n`;
      }
      return;
  }
}

export function outputFormat(opts: { sse?: boolean; aggregate?: boolean }): OutputFormat {
  if (opts.sse && opts.aggregate) {
    throw new Error("--sse and --aggregate cannot be used together");
  }
  if (opts.sse) return "sse";
  if (opts.aggregate) return "aggregate";
  return "json";
}

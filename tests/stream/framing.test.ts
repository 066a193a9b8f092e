import { describe, it, expect } from "vitest";
import { renderChunks, outputFormat } from "../../src/cli/render.js";
import { ChunkFactory, type ChatCompletionChunk } from "../../src/stream/chunks.js";
import { DONE_FRAME, collectCompletion, encodeChunkFrame, toEventStream } from "../../src/stream/framing.js";

const factory = new ChunkFactory("chatcmpl-1", "m", () => 5_000);

async function* from(chunks: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  yield* chunks;
}

async function all(texts: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const t of texts) out.push(t);
  return out;
}

describe("framing", () => {
  it("encodes a chunk as one data frame", () => {
    expect(encodeChunkFrame(factory.stop())).toBe(
      'data: {"id":"chatcmpl-1","object":"chat.completion.chunk","created":5,"model":"m","choices":[{"index":0,"delta":{},"finish_reason":"stop"}]}\n\n',
    );
  });

  it("terminates the event stream with [DONE]", async () => {
    const frames = await all(toEventStream(from([factory.content("hi"), factory.stop()])));
    expect(frames).toHaveLength(3);
    expect(frames[2]).toBe(DONE_FRAME);
    expect(frames[2]).toBe("data: [DONE]\n\n");
  });

  it("aggregates content and the finish reason", async () => {
    const completion = await collectCompletion(from([factory.content("Hel"), factory.content("lo"), factory.stop()]), {
      id: "unused",
      model: "unused",
    });
    expect(completion).toEqual({
      id: "chatcmpl-1",
      object: "chat.completion",
      created: 5,
      model: "m",
      choices: [{ index: 0, message: { role: "assistant", content: "Hello" }, finish_reason: "stop" }],
    });
  });

  it("keeps the error marker in aggregated content", async () => {
    const completion = await collectCompletion(from([factory.content("a"), factory.error("boom")]), { id: "x", model: "y" });
    expect(completion.choices[0].message.content).toBe("a[STREAM_ERROR]: boom");
  });

  it("falls back to the given envelope for an empty stream", async () => {
    const completion = await collectCompletion(from([]), { id: "fallback", model: "fm", now: () => 9_999 });
    expect(completion).toMatchObject({ id: "fallback", model: "fm", created: 9 });
    expect(completion.choices[0]).toEqual({ index: 0, message: { role: "assistant", content: "" }, finish_reason: null });
  });
});

describe("CLI rendering", () => {
  it("writes one JSON line per chunk by default", async () => {
    const lines = await all(renderChunks(from([factory.stop()]), "json", { id: "x", model: "y" }));
    expect(lines).toEqual([`${JSON.stringify(factory.stop())}\n`]);
  });

  it("writes a single aggregate document", async () => {
    const out = await all(renderChunks(from([factory.content("x"), factory.stop()]), "aggregate", { id: "x", model: "y" }));
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0])).toMatchObject({ object: "chat.completion", choices: [{ message: { content: "x" } }] });
  });

  it("picks the output format from flags", () => {
    expect(outputFormat({})).toBe("json");
    expect(outputFormat({ sse: true })).toBe("sse");
    expect(outputFormat({ aggregate: true })).toBe("aggregate");
    expect(() => outputFormat({ sse: true, aggregate: true })).toThrow("--sse and --aggregate cannot be used together");
  });
});

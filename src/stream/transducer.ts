import type { Utf8Mode } from "../config/config.js";
import * as diag from "../errors/diagnostic.js";
import type { Diagnostic } from "../errors/diagnostic.js";
import { EncodingError, RelayError, TransportError, UpstreamSignaledError, describeError } from "../errors/errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { Accumulator } from "./accumulator.js";
import { ChunkFactory, type ChatCompletionChunk, type Clock } from "./chunks.js";
import { createChunkDecoder, type ChunkDecoder } from "./decoder.js";
import { EventAssembler, type SseEvent } from "./events.js";
import { LineSplitter } from "./lines.js";
import { parseAction, parseRepoSources, parseSources } from "./records.js";

export type TransducerState = "reading" | "dispatching" | "finalizing" | "terminated";

export interface TransducerOptions {
  requestId: string;
  model: string;
  utf8Mode?: Utf8Mode;
  logger?: Logger;
  now?: Clock;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

function yielded(chunk: ChatCompletionChunk): IteratorYieldResult<ChatCompletionChunk> {
  return { done: false, value: chunk };
}

/**
 * Pull-driven state machine from SSE bytes to chat-completion chunks.
 *
 * Each `advance()` runs until it has a chunk to hand out or the stream ends,
 * awaiting the byte source only when no complete line is buffered. The
 * sequence ends with exactly one stop chunk or one error chunk.
 */
export class StreamTransducer implements AsyncIterable<ChatCompletionChunk> {
  readonly accumulator = new Accumulator();
  readonly diagnostics: Diagnostic[] = [];

  private current: TransducerState = "reading";
  private readonly source: AsyncIterator<Uint8Array>;
  private sourceReleased = false;
  private readonly splitter = new LineSplitter();
  private readonly assembler = new EventAssembler();
  private readonly decoder: ChunkDecoder;
  private readonly chunks: ChunkFactory;
  private readonly logger: Logger;
  private lines: string[] = [];

  constructor(source: AsyncIterable<Uint8Array>, options: TransducerOptions) {
    this.source = source[Symbol.asyncIterator]();
    this.decoder = createChunkDecoder(options.utf8Mode ?? "strict");
    this.chunks = new ChunkFactory(options.requestId, options.model, options.now);
    this.logger = (options.logger ?? silentLogger()).child({ component: "transducer", requestId: options.requestId });
  }

  get state(): TransducerState {
    return this.current;
  }

  async advance(): Promise<IteratorResult<ChatCompletionChunk, undefined>> {
    for (;;) {
      if (this.current === "terminated") return DONE;
      if (this.current === "finalizing") return this.finalize();

      // Reading: work through complete lines before asking for more bytes.
      const line = this.lines.shift();
      if (line !== undefined) {
        const event = this.assembler.feed(line);
        if (event === undefined) continue;

        this.current = "dispatching";
        const chunk = this.dispatch(event);
        if (this.accumulator.isFinished) {
          // An `error` event closed the stream.
          await this.terminate();
          return chunk === undefined ? DONE : yielded(chunk);
        }
        this.current = "reading";
        if (chunk !== undefined) return yielded(chunk);
        continue;
      }

      let next: IteratorResult<Uint8Array>;
      try {
        next = await this.source.next();
      } catch (e) {
        return this.fault(new TransportError(`Failed to read upstream stream: ${describeError(e)}`, { cause: e }));
      }
      if (this.current !== "reading") continue;
      if (next.done) {
        this.sourceReleased = true;
        this.current = "finalizing";
        continue;
      }

      let text: string;
      try {
        text = this.decoder.decode(next.value);
      } catch (e) {
        return this.fault(asRelayError(e));
      }
      this.lines = this.splitter.push(text);
    }
  }

  /** Stops the stream early. Buffers are dropped and the source is released. */
  async close(): Promise<void> {
    if (this.current === "terminated") return;
    this.logger.debug(
      {
        state: this.current,
        bufferedChars: this.splitter.buffered,
        bufferedLines: this.lines.length,
        pendingDataLines: this.assembler.pending.dataLines.length,
      },
      "Stream closed by consumer",
    );
    await this.terminate();
  }

  [Symbol.asyncIterator](): AsyncIterator<ChatCompletionChunk, undefined> {
    return {
      next: () => this.advance(),
      return: async () => {
        await this.close();
        return DONE;
      },
    };
  }

  private async finalize(): Promise<IteratorResult<ChatCompletionChunk, undefined>> {
    let tail: string;
    try {
      tail = this.decoder.finish();
    } catch (e) {
      return this.fault(asRelayError(e));
    }

    const trailing = this.splitter.push(tail);
    const partial = this.splitter.flush();
    if (partial !== undefined) trailing.push(partial);

    const events: SseEvent[] = [];
    for (const line of trailing) {
      const event = this.assembler.feed(line);
      if (event !== undefined) events.push(event);
    }
    const pending = this.assembler.flush();
    if (pending !== undefined) events.push(pending);

    // Side effects only; chunks produced here are never emitted.
    for (const event of events) {
      this.dispatch(event);
      if (this.accumulator.isFinished) break;
    }

    if (this.accumulator.isFinished) {
      this.logger.debug({ error: this.accumulator.error }, "Stream ended by a trailing error event");
      await this.terminate();
      return DONE;
    }

    this.accumulator.finish();
    this.logger.debug(
      { textLength: this.accumulator.text.length, relatedQuestions: this.accumulator.relatedQuestions.length },
      "Stream finished",
    );
    await this.terminate();
    return yielded(this.chunks.stop());
  }

  private dispatch(event: SseEvent): ChatCompletionChunk | undefined {
    const { event: name, data } = event;
    this.logger.trace({ event: name, dataLength: data.length }, "Dispatching event");
    const acc = this.accumulator;

    switch (name) {
      case "message":
      case "content":
      case "c":
        if (data.length === 0) return undefined;
        acc.appendText(data);
        return this.chunks.content(data);

      case "action": {
        const parsed = parseAction(data);
        if (parsed.ok) acc.addAction(parsed.value);
        else this.malformed(name, data, parsed.reason);
        return undefined;
      }

      case "sources": {
        const parsed = parseSources(data);
        if (parsed.ok) acc.replaceSources(parsed.value);
        else this.malformed(name, data, parsed.reason);
        return undefined;
      }

      case "repoSources": {
        const parsed = parseRepoSources(data);
        if (parsed.ok) acc.replaceGithubSources(parsed.value);
        else this.malformed(name, data, parsed.reason);
        return undefined;
      }

      case "rlq":
      case "q":
        if (data.length > 0) acc.appendRelatedQuestion(data);
        return undefined;

      case "r":
        acc.appendReasoning(data);
        return undefined;

      case "threadId":
      case "queryMessageId":
      case "answerMessageId":
      case "threadTitle":
        acc.setScalar(name, data);
        return undefined;

      case "error": {
        acc.fail(data);
        const err = new UpstreamSignaledError(data);
        this.diagnostics.push(diag.error("stream_error", err.message, name, data));
        this.logger.warn({ err }, "Backend signaled a stream error");
        return this.chunks.error(data);
      }

      case "finish":
        this.logger.debug({ data }, "Backend sent finish event");
        return undefined;

      default:
        this.diagnostics.push({ severity: "info", code: "unknown_event", message: `Ignored unknown event '${name}'`, event: name });
        this.logger.debug({ event: name }, "Ignoring unknown event");
        return undefined;
    }
  }

  private malformed(event: string, data: string, reason: string): void {
    const d = diag.malformedEventData(event, data, reason);
    this.diagnostics.push(d);
    this.logger.warn({ event, reason }, d.message);
  }

  private async fault(err: RelayError): Promise<IteratorResult<ChatCompletionChunk, undefined>> {
    this.logger.error({ err }, "Stream aborted");
    this.diagnostics.push(diag.error("stream_error", err.message));
    this.accumulator.fail(err.message);
    await this.terminate();
    return yielded(this.chunks.error(err.message));
  }

  private async terminate(): Promise<void> {
    this.current = "terminated";
    this.lines = [];
    this.splitter.clear();
    if (this.sourceReleased) return;
    this.sourceReleased = true;
    try {
      await this.source.return?.();
    } catch (e) {
      this.logger.debug({ err: e }, "Upstream source failed to close");
    }
  }
}

function asRelayError(e: unknown): RelayError {
  if (e instanceof RelayError) return e;
  return new EncodingError(describeError(e), { cause: e });
}

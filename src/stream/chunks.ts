export type FinishReason = "stop" | "length";

export interface ChunkDelta {
  role?: string;
  content?: string;
}

export interface ChunkChoice {
  index: 0;
  delta: ChunkDelta;
  finish_reason: FinishReason | null;
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: [ChunkChoice];
}

export const STREAM_ERROR_MARKER = "[STREAM_ERROR]";

export type Clock = () => number;

/**
 * Builds the chunks of one response. Id and model are fixed; `created` is read
 * from the clock for every chunk.
 */
export class ChunkFactory {
  constructor(
    readonly requestId: string,
    readonly model: string,
    private readonly now: Clock = Date.now,
  ) {}

  content(text: string): ChatCompletionChunk {
    return this.build({ role: "assistant", content: text }, null);
  }

  error(message: string): ChatCompletionChunk {
    return this.build({ role: "assistant", content: `${STREAM_ERROR_MARKER}: ${message}` }, "stop");
  }

  stop(): ChatCompletionChunk {
    return this.build({}, "stop");
  }

  private build(delta: ChunkDelta, finishReason: FinishReason | null): ChatCompletionChunk {
    return {
      id: this.requestId,
      object: "chat.completion.chunk",
      created: Math.floor(this.now() / 1000),
      model: this.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }
}

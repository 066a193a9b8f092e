import type { Utf8Mode } from "../config/config.js";
import { EncodingError } from "../errors/errors.js";

/** Turns received byte chunks into text. */
export interface ChunkDecoder {
  /** Throws `EncodingError` when the bytes are not valid UTF-8. */
  decode(bytes: Uint8Array): string;
  /** Called once at end of input; returns any text still held back. */
  finish(): string;
}

/** Decodes every chunk on its own; a character split across chunks is an error. */
export class StrictChunkDecoder implements ChunkDecoder {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });
  private received = 0;

  decode(bytes: Uint8Array): string {
    this.received++;
    try {
      return this.decoder.decode(bytes);
    } catch (e) {
      throw new EncodingError(`Byte chunk #${this.received} is not valid UTF-8`, { cause: e });
    }
  }

  finish(): string {
    return "";
  }
}

/** Carries an incomplete trailing sequence over to the next chunk. */
export class IncrementalChunkDecoder implements ChunkDecoder {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });
  private received = 0;

  decode(bytes: Uint8Array): string {
    this.received++;
    try {
      return this.decoder.decode(bytes, { stream: true });
    } catch (e) {
      throw new EncodingError(`Byte chunk #${this.received} is not valid UTF-8`, { cause: e });
    }
  }

  finish(): string {
    try {
      return this.decoder.decode();
    } catch (e) {
      throw new EncodingError("Byte stream ended inside a multi-byte character", { cause: e });
    }
  }
}

export function createChunkDecoder(mode: Utf8Mode): ChunkDecoder {
  return mode === "incremental" ? new IncrementalChunkDecoder() : new StrictChunkDecoder();
}

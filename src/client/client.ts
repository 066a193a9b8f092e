import type { BackendIdentity } from "../config/config.js";
import { TransportError, UpstreamHttpError, describeError } from "../errors/errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { Signer } from "../signing/signer.js";
import type { Clock } from "../stream/chunks.js";
import { buildSignedRequest, type RequestOptions } from "./request.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface BackendClientOptions {
  identity: BackendIdentity;
  signer: Signer;
  fetch?: FetchLike;
  logger?: Logger;
  now?: Clock;
  nonce?: () => string;
}

/**
 * Sends signed chat requests to the backend and hands back the raw SSE body.
 * Failed calls are not retried.
 */
export class BackendClient {
  private readonly identity: BackendIdentity;
  private readonly signer: Signer;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;
  private readonly now: Clock | undefined;
  private readonly nonce: (() => string) | undefined;

  constructor(options: BackendClientOptions) {
    this.identity = options.identity;
    this.signer = options.signer;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = (options.logger ?? silentLogger()).child({ component: "client" });
    this.now = options.now;
    this.nonce = options.nonce;
  }

  async openStream(content: string, options: RequestOptions, signal?: AbortSignal): Promise<AsyncIterable<Uint8Array>> {
    const request = await buildSignedRequest({
      signer: this.signer,
      identity: this.identity,
      content,
      options,
      stream: true,
      now: this.now,
      nonce: this.nonce,
    });
    this.logger.debug({ url: request.url, headers: request.headers, contentLength: content.length }, "Sending backend request");

    let response: Response;
    try {
      response = await this.fetchFn(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        signal,
      });
    } catch (e) {
      throw new TransportError(`Backend request failed: ${describeError(e)}`, { cause: e });
    }

    if (!response.ok) {
      const body = await response.text().catch((e: unknown) => `<failed to read error body: ${describeError(e)}>`);
      this.logger.error({ status: response.status }, "Backend returned an error status");
      throw new UpstreamHttpError(response.status, body);
    }
    if (response.body === null) {
      throw new TransportError("Backend response has no body");
    }

    this.logger.debug({ status: response.status }, "Backend stream opened");
    return readBody(response.body, this.logger);
  }
}

async function* readBody(body: ReadableStream<Uint8Array>, logger: Logger): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let drained = false;
  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) {
        drained = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch((e: unknown) => {
        logger.debug({ err: e }, "Failed to cancel backend stream");
      });
    }
    reader.releaseLock();
  }
}

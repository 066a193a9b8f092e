import { randomUUID } from "node:crypto";
import { BackendClient, type FetchLike } from "./client/client.js";
import { messagesToContent, type ChatMessage } from "./client/messages.js";
import { mapModelName } from "./client/models.js";
import { defaultRequestOptions, type RequestOptions } from "./client/request.js";
import { requireBackendIdentity, type RelayConfig } from "./config/config.js";
import { silentLogger, type Logger } from "./logging/logger.js";
import { WasmSigner, type Signer } from "./signing/signer.js";
import type { Clock } from "./stream/chunks.js";
import { collectCompletion, type ChatCompletion } from "./stream/framing.js";
import { StreamTransducer } from "./stream/transducer.js";

export interface RelayOptions {
  config: RelayConfig;
  logger?: Logger;
  /** Defaults to a `WasmSigner` over `config.signerModulePath`. */
  signer?: Signer;
  fetch?: FetchLike;
  now?: Clock;
}

export interface StreamOptions {
  /** Reported in every chunk. Generated as `chatcmpl-<uuid>` when absent. */
  requestId?: string;
  /** Gateway model name; mapped to the backend identifier for the request. */
  model?: string;
  /** Overrides on top of the default request options. */
  request?: Omit<RequestOptions, "model">;
  signal?: AbortSignal;
}

export interface TransduceOptions {
  requestId?: string;
  model?: string;
}

export interface Relay {
  readonly signer: Signer;
  stream(input: string | readonly ChatMessage[], options?: StreamOptions): Promise<StreamTransducer>;
  complete(input: string | readonly ChatMessage[], options?: StreamOptions): Promise<ChatCompletion>;
  transduce(bytes: AsyncIterable<Uint8Array>, options?: TransduceOptions): StreamTransducer;
}

export function newRequestId(): string {
  return `chatcmpl-${randomUUID()}`;
}

export function createRelay(options: RelayOptions): Relay {
  const { config, fetch, now } = options;
  const logger = options.logger ?? silentLogger();
  const signer = options.signer ?? WasmSigner.fromFile(config.signerModulePath, { logger });
  let client: BackendClient | undefined;

  function backend(): BackendClient {
    client ??= new BackendClient({ identity: requireBackendIdentity(config), signer, fetch, logger, now });
    return client;
  }

  function transduce(bytes: AsyncIterable<Uint8Array>, opts: TransduceOptions = {}): StreamTransducer {
    return new StreamTransducer(bytes, {
      requestId: opts.requestId ?? newRequestId(),
      model: opts.model ?? config.defaultModel,
      utf8Mode: config.utf8Mode,
      logger,
      now,
    });
  }

  async function stream(input: string | readonly ChatMessage[], opts: StreamOptions = {}): Promise<StreamTransducer> {
    const content = typeof input === "string" ? input : messagesToContent(input);
    const model = opts.model ?? config.defaultModel;
    const requestId = opts.requestId ?? newRequestId();
    const request: RequestOptions = { ...defaultRequestOptions(mapModelName(model)), ...opts.request };

    logger.info({ requestId, model, backendModel: request.model }, "Opening chat stream");
    const bytes = await backend().openStream(content, request, opts.signal);
    return transduce(bytes, { requestId, model });
  }

  async function complete(input: string | readonly ChatMessage[], opts: StreamOptions = {}): Promise<ChatCompletion> {
    const requestId = opts.requestId ?? newRequestId();
    const model = opts.model ?? config.defaultModel;
    const chunks = await stream(input, { ...opts, requestId, model });
    return collectCompletion(chunks, { id: requestId, model, now });
  }

  return { signer, stream, complete, transduce };
}

export { loadConfig, requireBackendIdentity } from "./config/config.js";
export type { RelayConfig, BackendIdentity, Utf8Mode, LogLevel } from "./config/config.js";
export * from "./errors/errors.js";
export type { Diagnostic } from "./errors/diagnostic.js";
export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export { WasmSigner } from "./signing/signer.js";
export type { Signer } from "./signing/signer.js";
export { StreamTransducer } from "./stream/transducer.js";
export type { ChatCompletionChunk } from "./stream/chunks.js";
export type { AccumulatorSnapshot } from "./stream/accumulator.js";
export { encodeChunkFrame, toEventStream, collectCompletion, DONE_FRAME } from "./stream/framing.js";
export type { ChatCompletion } from "./stream/framing.js";
export { BackendClient } from "./client/client.js";
export { buildRequestBody, buildSignedRequest, defaultRequestOptions } from "./client/request.js";
export type { RequestOptions, SignedRequest } from "./client/request.js";
export { messagesToContent } from "./client/messages.js";
export type { ChatMessage } from "./client/messages.js";
export { mapModelName } from "./client/models.js";

import { randomUUID } from "node:crypto";
import type { BackendIdentity } from "../config/config.js";
import type { Signer } from "../signing/signer.js";
import type { Clock } from "../stream/chunks.js";

export interface RequestOptions {
  model?: string;
  searchMode?: string;
  isExpert?: boolean;
  threadId?: string;
  pluginAction?: string;
  language?: string;
  programmingLanguage?: string;
}

export interface RequestBody {
  content: string;
  threadId?: string;
  extra: {
    searchMode?: string;
    model?: string;
    isExpert?: boolean;
    pluginFor: "vscode";
    pluginAction?: string;
    language?: string;
    programmingLanguage?: string;
  };
}

export interface SignedRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  nonce: string;
  timestamp: string;
}

export function defaultRequestOptions(model: string): RequestOptions {
  return { model, searchMode: "web", isExpert: false, language: "en" };
}

/** Absent options are left out of the body rather than sent as null. */
export function buildRequestBody(content: string, options: RequestOptions): RequestBody {
  const extra: RequestBody["extra"] = { pluginFor: "vscode" };
  if (options.searchMode !== undefined) extra.searchMode = options.searchMode;
  if (options.model !== undefined) extra.model = options.model;
  if (options.isExpert !== undefined) extra.isExpert = options.isExpert;
  if (options.pluginAction !== undefined) extra.pluginAction = options.pluginAction;
  if (options.language !== undefined) extra.language = options.language;
  if (options.programmingLanguage !== undefined) extra.programmingLanguage = options.programmingLanguage;

  const body: RequestBody = { content, extra };
  if (options.threadId !== undefined) body.threadId = options.threadId;
  return body;
}

export interface SignedRequestInput {
  signer: Signer;
  identity: BackendIdentity;
  content: string;
  options: RequestOptions;
  stream?: boolean;
  now?: Clock;
  nonce?: () => string;
}

/**
 * Signs `(nonce, timestamp, deviceId, content)` and assembles the headers and
 * JSON body of one backend call.
 */
export async function buildSignedRequest(input: SignedRequestInput): Promise<SignedRequest> {
  const { signer, identity, content, options } = input;
  const now = input.now ?? Date.now;
  const timestamp = String(Math.floor(now() / 1000));
  const nonce = (input.nonce ?? randomUUID)();

  const signature = await signer.sign(nonce, timestamp, identity.deviceId, content);

  const headers: Record<string, string> = {
    "content-type": "application/json",
    "device-id": identity.deviceId,
    "os-type": identity.osType,
    nonce,
    timestamp,
    sign: signature,
    sid: identity.sid,
  };
  if (input.stream ?? true) headers.accept = "text/event-stream";

  return {
    url: identity.apiEndpoint,
    headers,
    body: JSON.stringify(buildRequestBody(content, options)),
    nonce,
    timestamp,
  };
}

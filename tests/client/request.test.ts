import { describe, it, expect, vi } from "vitest";
import { messagesToContent } from "../../src/client/messages.js";
import { knownModelAliases, mapModelName } from "../../src/client/models.js";
import { buildRequestBody, buildSignedRequest, defaultRequestOptions } from "../../src/client/request.js";
import type { Signer } from "../../src/signing/signer.js";

const identity = {
  apiEndpoint: "https://backend.test/chat",
  deviceId: "device-1",
  osType: "3",
  sid: "test-secret",
};

describe("buildRequestBody", () => {
  it("uses the default options", () => {
    expect(buildRequestBody("hi", defaultRequestOptions("gpt-4.1"))).toEqual({
      content: "hi",
      extra: { searchMode: "web", model: "gpt-4.1", isExpert: false, pluginFor: "vscode", language: "en" },
    });
  });

  it("leaves absent options out and puts threadId at the top level", () => {
    const body = buildRequestBody("hi", { threadId: "t-1", pluginAction: "explain", programmingLanguage: "go" });
    expect(body).toEqual({
      content: "hi",
      threadId: "t-1",
      extra: { pluginFor: "vscode", pluginAction: "explain", programmingLanguage: "go" },
    });
    expect(Object.keys(body.extra)).not.toContain("model");
  });
});

describe("buildSignedRequest", () => {
  it("signs the nonce and timestamp it puts in the headers", async () => {
    const sign = vi.fn(async (nonce: string, timestamp: string, deviceId: string, query: string) =>
      [nonce, timestamp, deviceId, query].join("/"),
    );
    const signer: Signer = { sign };

    const request = await buildSignedRequest({
      signer,
      identity,
      content: "what is 2+2?",
      options: { model: "o3" },
      now: () => 1_700_000_999_999,
      nonce: () => "nonce-abc",
    });

    expect(sign).toHaveBeenCalledWith("nonce-abc", "1700000999", "device-1", "what is 2+2?");
    expect(request.nonce).toBe("nonce-abc");
    expect(request.timestamp).toBe("1700000999");
    expect(request.url).toBe("https://backend.test/chat");
    expect(request.headers).toEqual({
      "content-type": "application/json",
      "device-id": "device-1",
      "os-type": "3",
      nonce: "nonce-abc",
      timestamp: "1700000999",
      sign: "nonce-abc/1700000999/device-1/what is 2+2?",
      sid: "test-secret",
      accept: "text/event-stream",
    });
    expect(JSON.parse(request.body)).toEqual({ content: "what is 2+2?", extra: { model: "o3", pluginFor: "vscode" } });
  });

  it("omits the accept header for non-streaming calls", async () => {
    const request = await buildSignedRequest({
      signer: { sign: async () => "s" },
      identity,
      content: "x",
      options: {},
      stream: false,
    });
    expect(request.headers.accept).toBeUndefined();
  });

  it("generates a UUID v4 nonce by default", async () => {
    const request = await buildSignedRequest({ signer: { sign: async () => "s" }, identity, content: "x", options: {} });
    expect(request.nonce).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe("messagesToContent", () => {
  it("writes one line per message with role labels", () => {
    expect(
      messagesToContent([
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
        { role: "assistant", content: [{ type: "text", text: "Hello" }, { type: "image_url" }] },
        { role: "user", content: [{ type: "text", text: "a" }, { type: "text", text: "b" }] },
      ]),
    ).toBe("System: Be brief.\nUser: Hi\nAssistant: Hello [Non-text content]\nUser: a b");
  });

  it("returns an empty string for no messages", () => {
    expect(messagesToContent([])).toBe("");
  });
});

describe("mapModelName", () => {
  it.each([
    ["claude-3.5-sonnet", "us.anthropic.claude-3-7-sonnet-20250219-v1:0"],
    ["Claude-3-5-Sonnet-Thinking", "us.anthropic.claude-3-7-sonnet-20250219-v1:0-thinking"],
    ["claude-4-opus", "us.anthropic.claude-opus-4-20250514-v1:0"],
    ["GPT-4-1-mini", "gpt-4.1-mini"],
    ["gemini-2-flash", "gemini-2.0-flash-001"],
    ["O3", "o3"],
  ])("maps %s", (name, expected) => {
    expect(mapModelName(name)).toBe(expected);
  });

  it("passes unknown names through unchanged", () => {
    expect(mapModelName("My-Custom-Model")).toBe("My-Custom-Model");
  });

  it("lists aliases in lower case", () => {
    expect(knownModelAliases().every((alias) => alias === alias.toLowerCase())).toBe(true);
  });
});

import { describe, it, expect } from "vitest";
import { EventAssembler } from "../../src/stream/events.js";
import { LineSplitter, parseLine } from "../../src/stream/lines.js";

describe("LineSplitter", () => {
  it("holds a partial line until its newline arrives", () => {
    const splitter = new LineSplitter();
    expect(splitter.push("event: con")).toEqual([]);
    expect(splitter.push("tent\ndata: x\n")).toEqual(["event: content", "data: x"]);
    expect(splitter.buffered).toBe(0);
  });

  it("strips a carriage return split from its newline", () => {
    const splitter = new LineSplitter();
    expect(splitter.push("data: x\r")).toEqual([]);
    expect(splitter.push("\n\r\n")).toEqual(["data: x", ""]);
  });

  it("flushes the trailing partial line once", () => {
    const splitter = new LineSplitter();
    splitter.push("a\nrest\r");
    expect(splitter.flush()).toBe("rest");
    expect(splitter.flush()).toBeUndefined();
  });
});

describe("parseLine", () => {
  it.each([
    ["", { kind: "blank" }],
    [": ping", { kind: "comment", text: " ping" }],
    ["data: hello", { kind: "field", field: "data", value: "hello" }],
    ["data:hello", { kind: "field", field: "data", value: "hello" }],
    ["data:  two spaces", { kind: "field", field: "data", value: " two spaces" }],
    ["data: a: b", { kind: "field", field: "data", value: "a: b" }],
    ["data", { kind: "field", field: "data", value: "" }],
  ])("parses %j", (line, expected) => {
    expect(parseLine(line)).toEqual(expected);
  });
});

describe("EventAssembler", () => {
  function feedAll(lines: string[]) {
    const assembler = new EventAssembler();
    return lines.map((l) => assembler.feed(l)).filter((e) => e !== undefined);
  }

  it("joins data lines with newlines", () => {
    expect(feedAll(["event: content", "data: a", "data: b", ""])).toEqual([{ event: "content", data: "a\nb" }]);
  });

  it("defaults the event name to message", () => {
    expect(feedAll(["data: x", ""])).toEqual([{ event: "message", data: "x" }]);
  });

  it("ignores id, retry and unknown fields", () => {
    expect(feedAll(["id: 7", "retry: 10", "foo: bar", "data: x", ""])).toEqual([{ event: "message", data: "x" }]);
  });

  it("dispatches nothing for an event without data but still resets the name", () => {
    expect(feedAll(["event: threadId", "", "data: x", ""])).toEqual([{ event: "message", data: "x" }]);
  });

  it("dispatches an empty data line", () => {
    expect(feedAll(["event: r", "data:", ""])).toEqual([{ event: "r", data: "" }]);
  });

  it("hands out the pending event on flush", () => {
    const assembler = new EventAssembler();
    assembler.feed("event: q");
    assembler.feed("data: last");
    expect(assembler.pending).toEqual({ eventName: "q", dataLines: ["last"] });
    expect(assembler.flush()).toEqual({ event: "q", data: "last" });
    expect(assembler.flush()).toBeUndefined();
  });
});

// SSE line handling: splitting decoded text into lines across chunk
// boundaries, and classifying a single line.

export type SseLine =
  | { kind: "blank" }
  | { kind: "comment"; text: string }
  | { kind: "field"; field: string; value: string };

/**
 * Buffers decoded text and hands out complete lines. A line ends at `\n`; one
 * trailing `\r` is stripped, so `\r\n` split across two chunks still yields a
 * clean line.
 */
export class LineSplitter {
  private buffer = "";

  push(text: string): string[] {
    this.buffer += text;
    const lines: string[] = [];
    let start = 0;
    let newline = this.buffer.indexOf("\n", start);
    while (newline !== -1) {
      lines.push(stripCarriageReturn(this.buffer.slice(start, newline)));
      start = newline + 1;
      newline = this.buffer.indexOf("\n", start);
    }
    this.buffer = this.buffer.slice(start);
    return lines;
  }

  /** Text after the last `\n`, if any, as if it were line-terminated. */
  flush(): string | undefined {
    if (this.buffer.length === 0) return undefined;
    const rest = stripCarriageReturn(this.buffer);
    this.buffer = "";
    return rest;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = "";
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

export function parseLine(line: string): SseLine {
  if (line.length === 0) return { kind: "blank" };
  if (line.startsWith(":")) return { kind: "comment", text: line.slice(1) };

  const colon = line.indexOf(":");
  if (colon === -1) {
    return { kind: "field", field: line, value: "" };
  }
  let value = line.slice(colon + 1);
  if (value.startsWith(" ")) value = value.slice(1);
  return { kind: "field", field: line.slice(0, colon), value };
}

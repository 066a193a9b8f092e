import { parseLine } from "./lines.js";

export const DEFAULT_EVENT_NAME = "message";

export interface SseEvent {
  event: string;
  data: string;
}

/** Pending event state: the name and data lines seen since the last blank line. */
export interface PendingEvent {
  eventName: string;
  dataLines: string[];
}

/**
 * Folds SSE lines into events. `id`, `retry` and unknown fields are ignored;
 * a blank line dispatches the pending event when it carries data and always
 * resets the name to `message`.
 */
export class EventAssembler {
  private pendingEvent: PendingEvent = { eventName: DEFAULT_EVENT_NAME, dataLines: [] };

  get pending(): Readonly<PendingEvent> {
    return this.pendingEvent;
  }

  feed(line: string): SseEvent | undefined {
    const parsed = parseLine(line);
    switch (parsed.kind) {
      case "comment":
        return undefined;
      case "blank":
        return this.take();
      case "field":
        if (parsed.field === "event") {
          this.pendingEvent.eventName = parsed.value;
        } else if (parsed.field === "data") {
          this.pendingEvent.dataLines.push(parsed.value);
        }
        return undefined;
    }
  }

  /** Dispatches whatever is pending at end of input, as a blank line would. */
  flush(): SseEvent | undefined {
    return this.take();
  }

  private take(): SseEvent | undefined {
    const { eventName, dataLines } = this.pendingEvent;
    this.pendingEvent = { eventName: DEFAULT_EVENT_NAME, dataLines: [] };
    if (dataLines.length === 0) return undefined;
    return { event: eventName, data: dataLines.join("\n") };
  }
}

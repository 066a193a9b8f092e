export type Severity = "error" | "warning" | "info";

export type DiagnosticCode = "malformed_event_data" | "stream_error" | "unknown_event";

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  /** SSE event name the diagnostic was raised for, when there is one. */
  event?: string;
  /** Raw payload, truncated for display. */
  data?: string;
  help?: string;
}

const MAX_DATA_PREVIEW = 200;

export function preview(data: string): string {
  return data.length > MAX_DATA_PREVIEW ? `${data.slice(0, MAX_DATA_PREVIEW)}…` : data;
}

export function error(code: DiagnosticCode, message: string, event?: string, data?: string, help?: string): Diagnostic {
  return { severity: "error", code, message, event, data: data === undefined ? undefined : preview(data), help };
}

export function warning(code: DiagnosticCode, message: string, event?: string, data?: string, help?: string): Diagnostic {
  return { severity: "warning", code, message, event, data: data === undefined ? undefined : preview(data), help };
}

export function malformedEventData(event: string, data: string, reason: string): Diagnostic {
  return warning(
    "malformed_event_data",
    `Dropped '${event}' event: ${reason}`,
    event,
    data,
    "The stream continues; only this event's payload was skipped",
  );
}

export type RelayErrorCode =
  | "initialization"
  | "allocation"
  | "encoding"
  | "module_call"
  | "deallocation"
  | "transport"
  | "upstream"
  | "upstream_http"
  | "config";

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The signing module could not be loaded, or lacks a required export. */
export class InitializationError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("initialization", message, options);
  }
}

/** The module allocator returned a null pointer. */
export class AllocationError extends RelayError {
  readonly size: number;
  readonly align: number;

  constructor(size: number, align: number, purpose: string) {
    super("allocation", `Module allocator returned 0 for ${purpose} (size ${size}, align ${align})`);
    this.size = size;
    this.align = align;
  }
}

export class EncodingError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("encoding", message, options);
  }
}

/** An export trapped, or handed back a descriptor that does not fit linear memory. */
export class ModuleCallError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("module_call", message, options);
  }
}

export class DeallocationError extends RelayError {
  readonly failures: string[];

  constructor(failures: string[]) {
    super("deallocation", `Failed to free ${failures.length} module allocation(s): ${failures.join("; ")}`);
    this.failures = failures;
  }
}

export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport", message, options);
  }
}

/** The backend sent an explicit `error` event. */
export class UpstreamSignaledError extends RelayError {
  constructor(message: string) {
    super("upstream", message);
  }
}

export class UpstreamHttpError extends RelayError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super("upstream_http", `Backend returned HTTP ${status}: ${body}`);
    this.status = status;
    this.body = body;
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

import { InitializationError, describeError } from "../errors/errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { DEFAULT_EXPORT_NAMES, resolveSigningModule, type ExportNames, type SigningModule } from "./exports.js";
import { fileLoader, type InstanceLoader } from "./loader.js";
import { DESCRIPTOR_ALIGN, DESCRIPTOR_SIZE, checkDescriptorLength, decodeUtf8, readBytes, readDescriptor } from "./memory.js";
import { Mutex } from "./mutex.js";
import { withAllocationScope } from "./scope.js";

/** The one capability request builders need. Tests substitute their own. */
export interface Signer {
  sign(nonce: string, timestamp: string, deviceId: string, query: string): Promise<string>;
}

export interface WasmSignerOptions {
  load: InstanceLoader;
  exportNames?: Partial<ExportNames>;
  logger?: Logger;
}

/**
 * Drives the backend's signing module.
 *
 * The module instance is not reentrant, so every call, and the lazy first
 * load, runs behind one exclusive lock. A failed load is remembered and
 * re-thrown to every later caller; the module is never loaded twice.
 */
export class WasmSigner implements Signer {
  private readonly lock = new Mutex();
  private readonly load: InstanceLoader;
  private readonly exportNames: ExportNames;
  private readonly logger: Logger;
  private module: Promise<SigningModule> | undefined;

  constructor(options: WasmSignerOptions) {
    this.load = options.load;
    this.exportNames = { ...DEFAULT_EXPORT_NAMES, ...options.exportNames };
    this.logger = (options.logger ?? silentLogger()).child({ component: "signer" });
  }

  static fromFile(modulePath: string, options: Omit<WasmSignerOptions, "load"> & { imports?: WebAssembly.Imports } = {}): WasmSigner {
    const { imports, ...rest } = options;
    return new WasmSigner({ ...rest, load: fileLoader(modulePath, imports) });
  }

  /** Number of `sign` calls queued or running. */
  get pending(): number {
    return this.lock.pending;
  }

  sign(nonce: string, timestamp: string, deviceId: string, query: string): Promise<string> {
    return this.lock.runExclusive(async () => {
      const module = await this.ready();
      return this.signWith(module, nonce, timestamp, deviceId, query);
    });
  }

  private ready(): Promise<SigningModule> {
    this.module ??= this.initialize();
    return this.module;
  }

  private async initialize(): Promise<SigningModule> {
    this.logger.info("Initializing signing module");
    try {
      const instance = await this.load();
      const module = resolveSigningModule(instance, this.exportNames);
      this.logger.info({ memoryBytes: module.memory.buffer.byteLength }, "Signing module ready");
      return module;
    } catch (e) {
      const failure = e instanceof InitializationError
        ? e
        : new InitializationError(`Signing module initialization failed: ${describeError(e)}`, { cause: e });
      this.logger.error({ err: failure }, "Signing module initialization failed");
      throw failure;
    }
  }

  private signWith(module: SigningModule, nonce: string, timestamp: string, deviceId: string, query: string): string {
    this.logger.debug(
      { nonceLen: nonce.length, timestampLen: timestamp.length, deviceIdLen: deviceId.length, queryLen: query.length },
      "Signing request",
    );

    return withAllocationScope(module, this.logger, (scope) => {
      // 1. Descriptor slot the module writes its (ptr, len) result into.
      const descriptorPtr = scope.allocate(DESCRIPTOR_SIZE, DESCRIPTOR_ALIGN, "result descriptor");

      // 2. Inputs, in argument order.
      const n = scope.writeString(nonce, "nonce");
      const t = scope.writeString(timestamp, "timestamp");
      const d = scope.writeString(deviceId, "device id");
      const q = scope.writeString(query, "query");

      // 3. Call.
      module.sign(descriptorPtr, n.ptr, n.len, t.ptr, t.len, d.ptr, d.len, q.ptr, q.len);

      // 4. Locate the result; the module allocated it, we free it, even when
      // the length it reported is unusable.
      const result = readDescriptor(module.memory, descriptorPtr);
      if (result.ptr !== 0) {
        scope.adopt(result.ptr, result.len, 1, "signature result");
      }
      this.logger.trace({ resultPtr: result.ptr, resultLen: result.len }, "Module returned signature descriptor");
      checkDescriptorLength(result, descriptorPtr);

      // 5. Decode.
      if (result.len === 0) return "";
      return decodeUtf8(readBytes(module.memory, result.ptr, result.len), "Signature returned by the module");
    });
  }
}

import { InitializationError, ModuleCallError, describeError } from "../errors/errors.js";

// Export names follow the wasm-bindgen conventions used by the backend's signer.
export interface ExportNames {
  memory: string;
  malloc: string;
  free: string;
  sign: string;
}

export const DEFAULT_EXPORT_NAMES: ExportNames = {
  memory: "memory",
  malloc: "__wbindgen_malloc",
  free: "__wbindgen_free",
  sign: "sign",
};

/** Typed view over the four exports the bridge drives. */
export interface SigningModule {
  readonly memory: WebAssembly.Memory;
  malloc(size: number, align: number): number;
  free(ptr: number, size: number, align: number): void;
  sign(
    descriptorPtr: number,
    noncePtr: number, nonceLen: number,
    timestampPtr: number, timestampLen: number,
    deviceIdPtr: number, deviceIdLen: number,
    queryPtr: number, queryLen: number,
  ): void;
}

function requireFunction(exports: WebAssembly.Exports, name: string): Function {
  const value = exports[name];
  if (typeof value !== "function") {
    const available = Object.keys(exports).join(", ") || "(none)";
    throw new InitializationError(`Signing module export '${name}' not found or not a function. Available: ${available}`);
  }
  return value;
}

function callExport(name: string, fn: Function, args: number[]): unknown {
  try {
    return fn(...args);
  } catch (e) {
    throw new ModuleCallError(`Module export '${name}' trapped: ${describeError(e)}`, { cause: e });
  }
}

export function resolveSigningModule(
  instance: WebAssembly.Instance,
  names: ExportNames = DEFAULT_EXPORT_NAMES,
): SigningModule {
  const exports = instance.exports;

  const memory = exports[names.memory];
  if (!(memory instanceof WebAssembly.Memory)) {
    throw new InitializationError(`Signing module export '${names.memory}' not found or not a memory`);
  }
  const mallocFn = requireFunction(exports, names.malloc);
  const freeFn = requireFunction(exports, names.free);
  const signFn = requireFunction(exports, names.sign);

  return {
    memory,
    malloc(size, align) {
      const ptr = callExport(names.malloc, mallocFn, [size, align]);
      if (typeof ptr !== "number") {
        throw new ModuleCallError(`Module export '${names.malloc}' did not return an i32`);
      }
      // i32 results arrive signed; pointers are unsigned offsets.
      return ptr >>> 0;
    },
    free(ptr, size, align) {
      callExport(names.free, freeFn, [ptr, size, align]);
    },
    sign(...args) {
      callExport(names.sign, signFn, args);
    },
  };
}

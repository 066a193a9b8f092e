import binaryen from "binaryen";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { InitializationError, describeError } from "../errors/errors.js";

/** Produces the instantiated signing module. Called at most once per signer. */
export type InstanceLoader = () => Promise<WebAssembly.Instance>;

/**
 * Compiles a WebAssembly text module to binary with binaryen.
 * The module is validated before it is emitted.
 */
export function watToBinary(text: string, source = "<text>"): Uint8Array {
  let mod: binaryen.Module;
  try {
    mod = binaryen.parseText(text);
  } catch (e) {
    throw new InitializationError(`Failed to parse WebAssembly text module ${source}: ${describeError(e)}`, { cause: e });
  }
  try {
    if (!mod.validate()) {
      throw new InitializationError(`WebAssembly text module ${source} failed validation`);
    }
    return mod.emitBinary();
  } finally {
    mod.dispose();
  }
}

/** Reads a `.wasm` binary, or a `.wat` text module compiled through binaryen. */
export async function readModuleBytes(filePath: string): Promise<Uint8Array> {
  let raw: Buffer;
  try {
    raw = await readFile(filePath);
  } catch (e) {
    throw new InitializationError(`Failed to read signing module ${filePath}: ${describeError(e)}`, { cause: e });
  }
  if (path.extname(filePath).toLowerCase() === ".wat") {
    return watToBinary(raw.toString("utf-8"), filePath);
  }
  return new Uint8Array(raw);
}

export async function instantiateBytes(
  bytes: Uint8Array,
  imports: WebAssembly.Imports = {},
): Promise<WebAssembly.Instance> {
  try {
    const { instance } = await WebAssembly.instantiate(new Uint8Array(bytes), imports);
    return instance;
  } catch (e) {
    throw new InitializationError(`Failed to instantiate signing module: ${describeError(e)}`, { cause: e });
  }
}

export function bytesLoader(bytes: Uint8Array, imports?: WebAssembly.Imports): InstanceLoader {
  return () => instantiateBytes(bytes, imports);
}

export function fileLoader(filePath: string, imports?: WebAssembly.Imports): InstanceLoader {
  return async () => instantiateBytes(await readModuleBytes(filePath), imports);
}

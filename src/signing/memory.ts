// Linear memory access for the signing module.
//
// Every read and write builds a fresh view over `memory.buffer`: any call into
// the module may grow the memory, which detaches previously created views.

import { EncodingError, ModuleCallError } from "../errors/errors.js";

export interface Descriptor {
  ptr: number;
  len: number;
}

export const DESCRIPTOR_SIZE = 8;
export const DESCRIPTOR_ALIGN = 4;

function checkRange(memory: WebAssembly.Memory, ptr: number, len: number, what: string): void {
  if (len < 0 || ptr < 0 || ptr + len > memory.buffer.byteLength) {
    throw new ModuleCallError(
      `${what} [${ptr}, ${ptr + len}) is outside linear memory (${memory.buffer.byteLength} bytes)`,
    );
  }
}

export function writeBytes(memory: WebAssembly.Memory, ptr: number, bytes: Uint8Array): void {
  checkRange(memory, ptr, bytes.length, "Write");
  new Uint8Array(memory.buffer, ptr, bytes.length).set(bytes);
}

/** Copies bytes out of linear memory; the copy survives later memory growth. */
export function readBytes(memory: WebAssembly.Memory, ptr: number, len: number): Uint8Array {
  checkRange(memory, ptr, len, "Read");
  return new Uint8Array(memory.buffer, ptr, len).slice();
}

/**
 * Decodes the `(ptr: i32, len: i32)` little-endian pair the module writes at
 * `descriptorPtr`. The length is returned as written, sign included; see
 * `checkDescriptorLength`.
 */
export function readDescriptor(memory: WebAssembly.Memory, descriptorPtr: number): Descriptor {
  checkRange(memory, descriptorPtr, DESCRIPTOR_SIZE, "Descriptor");
  const view = new DataView(memory.buffer);
  return {
    ptr: view.getUint32(descriptorPtr, true),
    len: view.getInt32(descriptorPtr + 4, true),
  };
}

export function checkDescriptorLength(descriptor: Descriptor, descriptorPtr: number): void {
  if (descriptor.len < 0) {
    throw new ModuleCallError(`Descriptor at ${descriptorPtr} carries a negative length (${descriptor.len})`);
  }
}

const strictDecoder = new TextDecoder("utf-8", { fatal: true });
const encoder = new TextEncoder();

export function encodeUtf8(value: string): Uint8Array {
  return encoder.encode(value);
}

export function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return strictDecoder.decode(bytes);
  } catch (e) {
    throw new EncodingError(`${what} is not valid UTF-8`, { cause: e });
  }
}

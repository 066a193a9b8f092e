import { watToBinary } from "../../src/signing/loader.js";

// A small signing module with the same ABI as the backend's: bump allocator,
// a free that only counts, and a `sign` that writes an FNV-1a digest of
// `nonce|timestamp|deviceId|query` as 8 hex characters.

export interface ReferenceModuleOptions {
  /** Corrupt the first byte of every result so it is not valid UTF-8. */
  invalidUtf8?: boolean;
  /** Make the deallocator trap. */
  trapOnFree?: boolean;
  /** Leave out the export with this name. */
  omitExport?: "memory" | "__wbindgen_malloc" | "__wbindgen_free" | "sign";
  /** Report a zero-length result at pointer 0. */
  emptyResult?: boolean;
  /** Report the allocated result with a length of -1. */
  negativeLength?: boolean;
}

/** Requests of this many bytes or more get a null pointer back. */
export const ALLOCATION_LIMIT = 4096;

function exportClause(name: string, options: ReferenceModuleOptions): string {
  return options.omitExport === name ? "" : `(export "${name}")`;
}

export function referenceModuleWat(options: ReferenceModuleOptions = {}): string {
  const freeBody = options.trapOnFree
    ? "(unreachable)"
    : "(global.set $live (i32.sub (global.get $live) (i32.const 1)))";
  const corrupt = options.invalidUtf8 ? "(i32.store8 (local.get $out) (i32.const 255))" : "";
  const writeResult = options.emptyResult
    ? `(i32.store (local.get $ret) (i32.const 0))
    (i32.store offset=4 (local.get $ret) (i32.const 0))`
    : `(local.set $out (call $malloc (i32.const 8) (i32.const 1)))
    (local.set $i (i32.const 0))
    (block $done
      (loop $next
        (br_if $done (i32.ge_u (local.get $i) (i32.const 8)))
        (local.set $n
          (i32.and
            (i32.shr_u (local.get $h) (i32.sub (i32.const 28) (i32.shl (local.get $i) (i32.const 2))))
            (i32.const 15)))
        (i32.store8
          (i32.add (local.get $out) (local.get $i))
          (select
            (i32.add (local.get $n) (i32.const 48))
            (i32.add (local.get $n) (i32.const 87))
            (i32.lt_u (local.get $n) (i32.const 10))))
        (local.set $i (i32.add (local.get $i) (i32.const 1)))
        (br $next)))
    ${corrupt}
    (i32.store (local.get $ret) (local.get $out))
    (i32.store offset=4 (local.get $ret) (i32.const ${options.negativeLength ? -1 : 8}))`;

  return `(module
  (memory $mem ${exportClause("memory", options)} 1)
  (global $heap (mut i32) (i32.const 1024))
  (global $live (mut i32) (i32.const 0))

  (func $live_allocs (export "live_allocs") (result i32)
    (global.get $live))

  (func $malloc ${exportClause("__wbindgen_malloc", options)} (param $size i32) (param $align i32) (result i32)
    (local $ptr i32)
    (if (i32.ge_u (local.get $size) (i32.const ${ALLOCATION_LIMIT}))
      (then (return (i32.const 0))))
    (local.set $ptr
      (i32.and
        (i32.add (global.get $heap) (i32.sub (local.get $align) (i32.const 1)))
        (i32.xor (i32.sub (local.get $align) (i32.const 1)) (i32.const -1))))
    (global.set $heap (i32.add (local.get $ptr) (local.get $size)))
    (if (i32.gt_u (global.get $heap) (i32.mul (memory.size) (i32.const 65536)))
      (then (drop (memory.grow (i32.const 1)))))
    (global.set $live (i32.add (global.get $live) (i32.const 1)))
    (local.get $ptr))

  (func $free ${exportClause("__wbindgen_free", options)} (param $ptr i32) (param $size i32) (param $align i32)
    ${freeBody})

  (func $fnv (param $h i32) (param $ptr i32) (param $len i32) (result i32)
    (local $end i32)
    (local.set $end (i32.add (local.get $ptr) (local.get $len)))
    (block $done
      (loop $next
        (br_if $done (i32.ge_u (local.get $ptr) (local.get $end)))
        (local.set $h
          (i32.mul
            (i32.xor (local.get $h) (i32.load8_u (local.get $ptr)))
            (i32.const 16777619)))
        (local.set $ptr (i32.add (local.get $ptr) (i32.const 1)))
        (br $next)))
    (local.get $h))

  (func $sep (param $h i32) (result i32)
    (i32.mul (i32.xor (local.get $h) (i32.const 124)) (i32.const 16777619)))

  (func $sign ${exportClause("sign", options)}
    (param $ret i32)
    (param $p1 i32) (param $l1 i32)
    (param $p2 i32) (param $l2 i32)
    (param $p3 i32) (param $l3 i32)
    (param $p4 i32) (param $l4 i32)
    (local $h i32) (local $out i32) (local $i i32) (local $n i32)
    (local.set $h (i32.const -2128831035))
    (local.set $h (call $fnv (local.get $h) (local.get $p1) (local.get $l1)))
    (local.set $h (call $sep (local.get $h)))
    (local.set $h (call $fnv (local.get $h) (local.get $p2) (local.get $l2)))
    (local.set $h (call $sep (local.get $h)))
    (local.set $h (call $fnv (local.get $h) (local.get $p3) (local.get $l3)))
    (local.set $h (call $sep (local.get $h)))
    (local.set $h (call $fnv (local.get $h) (local.get $p4) (local.get $l4)))
    ${writeResult})
)
`;
}

export function referenceModuleBytes(options: ReferenceModuleOptions = {}): Uint8Array {
  return watToBinary(referenceModuleWat(options), "reference signing module");
}

/** The digest the reference module computes, for assertions. */
export function referenceSignature(nonce: string, timestamp: string, deviceId: string, query: string): string {
  let h = 0x811c9dc5;
  for (const byte of new TextEncoder().encode([nonce, timestamp, deviceId, query].join("|"))) {
    h = Math.imul(h ^ byte, 16777619);
  }
  return (h >>> 0).toString(16).padStart(8, "0");
}

/** Outstanding allocations, read from the module's `live_allocs` export. */
export function liveAllocations(instance: WebAssembly.Instance): number {
  const fn = instance.exports.live_allocs;
  if (typeof fn !== "function") throw new Error("live_allocs export missing");
  const value: unknown = fn();
  if (typeof value !== "number") throw new Error("live_allocs did not return a number");
  return value;
}

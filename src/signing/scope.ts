import { AllocationError, DeallocationError, describeError } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import type { SigningModule } from "./exports.js";
import { encodeUtf8, writeBytes } from "./memory.js";

export interface Allocation {
  ptr: number;
  size: number;
  align: number;
  purpose: string;
}

/**
 * Tracks every block allocated in the module during one transaction so all of
 * them can be returned to the module on every exit path.
 */
export class AllocationScope {
  private readonly allocations: Allocation[] = [];
  private released = false;

  constructor(
    private readonly module: SigningModule,
    private readonly logger: Logger,
  ) {}

  allocate(size: number, align: number, purpose: string): number {
    const ptr = this.module.malloc(size, align);
    if (ptr === 0) {
      throw new AllocationError(size, align, purpose);
    }
    this.allocations.push({ ptr, size, align, purpose });
    return ptr;
  }

  /** Takes ownership of a block the module allocated on its own (e.g. a result buffer). */
  adopt(ptr: number, size: number, align: number, purpose: string): void {
    this.allocations.push({ ptr, size, align, purpose });
  }

  /** Allocates `len(utf8(value))` bytes with alignment 1 and copies the string in. */
  writeString(value: string, purpose: string): { ptr: number; len: number } {
    const bytes = encodeUtf8(value);
    const ptr = this.allocate(bytes.length, 1, purpose);
    writeBytes(this.module.memory, ptr, bytes);
    return { ptr, len: bytes.length };
  }

  /**
   * Frees every tracked allocation, newest first. Keeps going past failures
   * and returns their descriptions.
   */
  release(): string[] {
    if (this.released) return [];
    this.released = true;

    const failures: string[] = [];
    for (let i = this.allocations.length - 1; i >= 0; i--) {
      const { ptr, size, align, purpose } = this.allocations[i];
      try {
        this.module.free(ptr, size, align);
      } catch (e) {
        failures.push(`${purpose} at ${ptr}: ${describeError(e)}`);
      }
    }
    this.logger.trace({ freed: this.allocations.length - failures.length, failed: failures.length }, "Released module allocations");
    this.allocations.length = 0;
    return failures;
  }
}

/**
 * Runs `work` inside an allocation scope. Allocations are released whether
 * `work` returns or throws; a release failure never replaces an error thrown
 * by `work`.
 */
export function withAllocationScope<T>(
  module: SigningModule,
  logger: Logger,
  work: (scope: AllocationScope) => T,
): T {
  const scope = new AllocationScope(module, logger);
  let outcome: T;
  try {
    outcome = work(scope);
  } catch (e) {
    const failures = scope.release();
    if (failures.length > 0) {
      logger.error({ failures }, "Module allocations could not be freed after a failed call");
    }
    throw e;
  }
  const failures = scope.release();
  if (failures.length > 0) {
    throw new DeallocationError(failures);
  }
  return outcome;
}

import { vi } from "vitest";
import type { RelayLogger } from "../../src/types.js";

export function makeLogger() {
  return {
    info: vi.fn<(msg: string) => void>(),
    warn: vi.fn<(msg: string) => void>(),
    error: vi.fn<(msg: string) => void>(),
    debug: vi.fn<(msg: string) => void>(),
  } satisfies RelayLogger;
}

/** Every message passed to one level of a mock logger. */
export function messages(fn: { mock: { calls: Array<[string]> } }): string[] {
  return fn.mock.calls.map(([msg]) => msg);
}

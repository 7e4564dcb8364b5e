import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { vi } from "vitest";
import type { LogSink } from "../lib/logger";

/** A version 2 flow log record with the given destination port and protocol. */
export function flowLine(dstPort: string | number, protocol: string | number, status = "OK"): string {
  return [
    2,
    "123456789012",
    "eni-0a1b2c3d",
    "10.0.1.201",
    "198.51.100.2",
    49153,
    dstPort,
    protocol,
    25,
    20000,
    1620140761,
    1620140821,
    "ACCEPT",
    status,
  ].join(" ");
}

export function createSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
}

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(`${tmpdir()}/flowtag-`);
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
